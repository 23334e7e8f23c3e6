import { describe, expect, it } from "vitest";

import {
  EXIT_CODE_CONFIG_ERROR,
  EXIT_CODE_INTERNAL_ERROR,
  EXIT_CODE_LOCKED,
  EXIT_CODE_OK,
  EXIT_CODE_RUNTIME_FAILURE,
  exitCodeFromRollupStatus,
} from "../exit-codes";

describe("exitCodeFromRollupStatus", () => {
  it.each([
    ["completed", EXIT_CODE_OK],
    ["locked", EXIT_CODE_LOCKED],
    ["failed", EXIT_CODE_RUNTIME_FAILURE],
  ] as const)("maps %s to its exit code", (status, code) => {
    expect(exitCodeFromRollupStatus(status)).toBe(code);
  });
});

describe("static exit code contracts", () => {
  it("keeps the documented numbers", () => {
    expect([
      EXIT_CODE_OK,
      EXIT_CODE_LOCKED,
      EXIT_CODE_RUNTIME_FAILURE,
      EXIT_CODE_CONFIG_ERROR,
      EXIT_CODE_INTERNAL_ERROR,
    ]).toEqual([0, 1, 2, 3, 4]);
  });
});
