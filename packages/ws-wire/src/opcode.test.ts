import { describe, expect, it } from "vitest";

import { Opcode, isControlOpcode, isDataOpcode, opcodeName } from "./opcode.ts";

describe("opcodes", () => {
  it.each([Opcode.Continuation, Opcode.Text, Opcode.Binary])("0x%i carries data", (opcode) => {
    expect(isDataOpcode(opcode)).toBe(true);
    expect(isControlOpcode(opcode)).toBe(false);
  });

  it.each([Opcode.Close, Opcode.Ping, Opcode.Pong, 0xb])("0x%i is a control opcode", (opcode) => {
    expect(isDataOpcode(opcode)).toBe(false);
    expect(isControlOpcode(opcode)).toBe(true);
  });

  it("treats reserved non-control opcodes as neither data nor control", () => {
    expect(isDataOpcode(0x3)).toBe(false);
    expect(isControlOpcode(0x3)).toBe(false);
    expect(opcodeName(0x3)).toBe("reserved(0x3)");
  });
});
