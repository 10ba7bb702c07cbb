import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import * as p from "@clack/prompts";
import { SCENARIOS, detectFilesystem, runSelftest } from "../commands/selftest.js";
import { removeDir, scratchDir } from "./helpers.js";

vi.mock("@clack/prompts", () => ({
  intro: vi.fn(),
  outro: vi.fn(),
  log: { info: vi.fn(), success: vi.fn(), error: vi.fn() },
}));

describe("selftest", () => {
  let base = "";

  beforeEach(() => {
    vi.clearAllMocks();
    base = scratchDir();
  });

  afterEach(() => {
    removeDir(base);
  });

  it("detects the kind of filesystem", () => {
    expect(["case-sensitive", "case-preserving"]).toContain(detectFilesystem(base));
  });

  it("passes every scenario", () => {
    expect(runSelftest(base)).toBe(0);
    expect(p.log.error).not.toHaveBeenCalled();
    expect(p.log.success).toHaveBeenCalledTimes(SCENARIOS.length);
    expect(p.outro).toHaveBeenCalledWith(expect.stringContaining(`All ${SCENARIOS.length} tests passed.`));
  });
});
