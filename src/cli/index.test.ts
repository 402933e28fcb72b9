/**
 * CLI argument validation tests.
 * Checks that each command exposes the options listed in its matrix entry.
 */

import { describe, expect, it } from "vitest";
import { createCliProgram } from "./index";
import { formatOutput, validatePort } from "./utils";

describe("CLI Command Arguments Matrix", () => {
  const program = createCliProgram();

  const getCommandOptions = (commandName: string) => {
    const command = program.commands.find((cmd) => cmd.name() === commandName);
    return command?.options.map((opt) => opt.long) || [];
  };

  const commandMatrix = {
    serve: {
      hasPort: true,
      hasTokenExchangeToggle: true,
      hasSecret: false,
    },
    "issue-token": {
      hasPort: false,
      hasTokenExchangeToggle: false,
      hasSecret: true,
    },
  };

  it("should register exactly the matrix commands", () => {
    expect(program.commands.map((cmd) => cmd.name())).toEqual(Object.keys(commandMatrix));
  });

  it("should offer the global logging flags", () => {
    const globalOptions = program.options.map((opt) => opt.long);
    expect(globalOptions).toContain("--verbose");
    expect(globalOptions).toContain("--silent");
  });

  Object.entries(commandMatrix).forEach(([commandName, expectedOptions]) => {
    it(`should have correct options for ${commandName} command`, () => {
      const options = getCommandOptions(commandName);

      if (expectedOptions.hasPort) {
        expect(options).toContain("--port");
      } else {
        expect(options).not.toContain("--port");
      }

      if (expectedOptions.hasTokenExchangeToggle) {
        expect(options).toContain("--no-token-exchange");
      } else {
        expect(options).not.toContain("--no-token-exchange");
      }

      if (expectedOptions.hasSecret) {
        expect(options).toContain("--secret");
      } else {
        expect(options).not.toContain("--secret");
      }
    });
  });
});

describe("CLI utilities", () => {
  it("should accept valid ports", () => {
    expect(validatePort("1")).toBe(1);
    expect(validatePort("6290")).toBe(6290);
    expect(validatePort("65535")).toBe(65535);
  });

  it.each(["0", "65536", "abc", ""])("should reject port %j", (value) => {
    expect(() => validatePort(value)).toThrow("Invalid port number");
  });

  it("should format output as indented JSON", () => {
    expect(formatOutput({ clientId: "client-a" })).toBe('{\n  "clientId": "client-a"\n}');
  });
});
