export {
  EXIT_CODE_OK,
  EXIT_CODE_LOCKED,
  EXIT_CODE_RUNTIME_FAILURE,
  EXIT_CODE_CONFIG_ERROR,
  EXIT_CODE_INTERNAL_ERROR,
  exitCodeFromRollupStatus,
} from "../exit-codes";

export type { ExitCode, RollupExitStatus } from "../exit-codes";
