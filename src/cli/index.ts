export { parseCliCommand, SUPPORTED_CLI_COMMANDS } from "./commands";
export type { CliCommand, ParsedCliCommand } from "./commands";
export { CliCommandError, CliFlagError } from "./errors";
export { runCli } from "./execute";
export type { CliIo } from "./execute";
export {
  EXIT_CODE_CONFIG_ERROR,
  EXIT_CODE_INTERNAL_ERROR,
  EXIT_CODE_LOCKED,
  EXIT_CODE_OK,
  EXIT_CODE_RUNTIME_FAILURE,
  exitCodeFromRollupStatus,
} from "./exit-codes";
export type { ExitCode, RollupExitStatus } from "./exit-codes";
export { CONFIG_PATH_ENV, parseCliFlags } from "./flags";
export type { CliParameters, ParseCliFlagsOptions } from "./flags";
export {
  generateBashCompletionScript,
  generatePwshCompletionScript,
  generateZshCompletionScript,
  renderCliHelp,
} from "./help";
