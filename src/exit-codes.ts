export const EXIT_CODE_OK = 0 as const;
export const EXIT_CODE_LOCKED = 1 as const;
export const EXIT_CODE_RUNTIME_FAILURE = 2 as const;
export const EXIT_CODE_CONFIG_ERROR = 3 as const;
export const EXIT_CODE_INTERNAL_ERROR = 4 as const;

export type ExitCode =
  | typeof EXIT_CODE_OK
  | typeof EXIT_CODE_LOCKED
  | typeof EXIT_CODE_RUNTIME_FAILURE
  | typeof EXIT_CODE_CONFIG_ERROR
  | typeof EXIT_CODE_INTERNAL_ERROR;

export type RollupExitStatus = "completed" | "locked" | "failed";

export function exitCodeFromRollupStatus(status: RollupExitStatus): ExitCode {
  switch (status) {
    case "completed":
      return EXIT_CODE_OK;
    case "locked":
      return EXIT_CODE_LOCKED;
    case "failed":
      return EXIT_CODE_RUNTIME_FAILURE;
    default: {
      const exhaustiveCheck: never = status;
      return exhaustiveCheck;
    }
  }
}
