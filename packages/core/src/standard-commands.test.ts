/**
 * Tests for the opt-in help and version commands
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { buildApp, createApp, register } from "./app.js";
import { run } from "./dispatcher.js";
import { renderHelp } from "./help.js";
import {
  helpCommand,
  versionCommand,
  withStandardCommands,
} from "./standard-commands.js";
import type { AppMeta } from "./types.js";

const meta: AppMeta = {
  name: "cli",
  usage: "cli [command]",
  version: "2.3.4",
};

describe("Standard commands", () => {
  describe("versionCommand", () => {
    it("should print name and version", () => {
      const output: string[] = [];
      const command = versionCommand(meta, (text) => output.push(text));

      command.action([]);
      expect(command.name).to.equal("version");
      expect(command.usage).to.equal("cli version");
      expect(output).to.deep.equal(["cli v2.3.4"]);
    });
  });

  describe("helpCommand", () => {
    it("should print help for the app returned at call time", () => {
      const output: string[] = [];
      const empty = createApp(meta);
      const result = buildApp(meta, [
        { name: "hello", usage: "cli hello", action: () => {} },
      ]);
      if (!result.ok) throw new Error(result.error);
      let current = empty;

      const command = helpCommand(() => current, (text) => output.push(text));
      current = result.value;
      command.action([]);

      expect(output).to.deep.equal([renderHelp(result.value)]);
    });
  });

  describe("withStandardCommands", () => {
    it("should register help and version after existing commands", () => {
      const base = buildApp(meta, [
        { name: "hello", usage: "cli hello", action: () => {} },
      ]);
      if (!base.ok) throw new Error(base.error);

      const result = withStandardCommands(base.value, () => {});
      if (!result.ok) throw new Error(result.error);
      expect(result.value.commands.map((c) => c.name)).to.deep.equal([
        "hello",
        "help",
        "version",
      ]);
    });

    it("should list itself when help is dispatched", () => {
      const output: string[] = [];
      const result = withStandardCommands(createApp(meta), (text) =>
        output.push(text)
      );
      if (!result.ok) throw new Error(result.error);

      const dispatch = run(result.value, ["cli", "help"], () => {});
      expect(dispatch.kind).to.equal("action");
      expect(output).to.deep.equal([renderHelp(result.value)]);
      expect(output[0]).to.include("  help     cli help - Show this help");
      expect(output[0]).to.include("  version  cli version - Show version");
    });

    it("should print the same help for the help command and an unknown token", () => {
      const base = buildApp(meta, [
        { name: "hello", usage: "cli hello", action: () => {} },
      ]);
      if (!base.ok) throw new Error(base.error);

      const fromHelp: string[] = [];
      const fromMiss: string[] = [];
      const helpOnly = withStandardCommands(base.value, (text) =>
        fromHelp.push(text)
      );
      if (!helpOnly.ok) throw new Error(helpOnly.error);

      run(helpOnly.value, ["cli", "help"], () => {});
      run(helpOnly.value, ["cli", "nope"], (text) => fromMiss.push(text));
      expect(fromHelp).to.have.length(1);
      expect(fromHelp).to.deep.equal(fromMiss);
    });

    it("should seal the app against later registrations", () => {
      const result = withStandardCommands(createApp(meta), () => {});
      if (!result.ok) throw new Error(result.error);

      expect(result.value.sealed).to.be.true;
      expect(
        register(result.value, {
          name: "extra",
          usage: "cli extra",
          action: () => {},
        })
      ).to.deep.equal({
        ok: false,
        error: "Cannot register 'extra': app is sealed by its help command",
      });
    });

    it("should fail when the app already has a help command", () => {
      const base = buildApp(meta, [
        { name: "help", usage: "cli help", action: () => {} },
      ]);
      if (!base.ok) throw new Error(base.error);

      expect(withStandardCommands(base.value)).to.deep.equal({
        ok: false,
        error: "Command 'help' is already registered",
      });
    });
  });
});
