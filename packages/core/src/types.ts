/**
 * Type definitions for hitch applications
 */

/**
 * Output sink used for help and command output
 */
export type Writer = (text: string) => void;

/**
 * Callback bound to a subcommand.
 * Receives only the arguments after the subcommand token.
 */
export type Action = (args: readonly string[]) => void;

/**
 * A named subcommand
 */
export type Command = {
  readonly name: string;
  readonly usage: string;
  readonly description?: string;
  readonly action: Action;
};

/**
 * Top-level application metadata
 */
export type AppMeta = {
  readonly name: string;
  readonly displayName?: string; // Banner printed above help
  readonly usage: string;
  readonly version: string;
  readonly description?: string;
  readonly author?: string;
};

/**
 * Application with its command registry
 */
export type App = AppMeta & {
  readonly commands: readonly Command[];
  readonly sealed?: boolean; // Set once a help command is bound; no more commands
};

/**
 * Split process arguments
 */
export type ParsedArgs = {
  readonly token?: string;
  readonly args: readonly string[];
};

/**
 * Outcome of a single `run` call
 */
export type Dispatch =
  | {
      readonly kind: "action";
      readonly command: string;
      readonly args: readonly string[];
    }
  | {
      readonly kind: "help";
      readonly reason: "missing" | "unknown";
      readonly token?: string;
    };

/**
 * Result type for operations
 */
export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };
