import { describe, expect, it } from "vitest";
import * as procbed from "../index";

describe("public API", () => {
  it("exposes the runner and the language pipeline", () => {
    expect(procbed.Runner).toBeTypeOf("function");
    expect(procbed.parseConfig("[commands]\nsleep 1;").commands).toHaveLength(1);
    expect(procbed.describeValue(procbed.rangeValue(0, 3))).toBe("0..3");
    expect(new procbed.SpawnError("x")).toBeInstanceOf(procbed.ProcbedError);
  });
});
