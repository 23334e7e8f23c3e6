import { describe, expect, it } from "vitest";

import {
  generateBashCompletionScript,
  generatePwshCompletionScript,
  generateZshCompletionScript,
  renderCliHelp,
  SUPPORTED_CLI_COMMANDS,
} from "../index";

describe("renderCliHelp", () => {
  it("produces a multi-section help message", () => {
    const help = renderCliHelp();

    expect(help.startsWith("sitepulse - ")).toBe(true);
    expect(help).toContain("Usage:\n  sitepulse <command> [options]\n");
    expect(help).toContain("Commands:");
    expect(help).toContain("Options:");
    expect(help).toContain("Examples:");
    expect(help.endsWith("\n")).toBe(true);
  });

  it("mentions every supported command and flag", () => {
    const help = renderCliHelp();

    for (const command of SUPPORTED_CLI_COMMANDS) {
      expect(help).toContain(`  ${command}`);
    }
    for (const flag of ["--config <path>", "--log-level <level>", "--listen <host:port>"]) {
      expect(help).toContain(flag);
    }
  });
});

describe("shell completion generators", () => {
  it("includes commands and flags in the bash script", () => {
    const script = generateBashCompletionScript();

    expect(script).toContain("complete -F _sitepulse sitepulse");
    expect(script).toContain('compgen -W "run rollup worker summary validate help"');
    expect(script).toContain('compgen -W "debug info warn error"');
    expect(script.endsWith("\n")).toBe(true);
  });

  it("lists every option in the zsh script", () => {
    const script = generateZshCompletionScript();

    expect(script.startsWith("#compdef sitepulse\n")).toBe(true);
    expect(script).toContain('"1:command:(run rollup worker summary validate help)"');
    expect(script).toContain('"--log-level[One of debug, info, warn, error. Overrides log_level from the file.]" \\');
    expect(script).toContain('    "--help[Show this help message and exit.]"\n    ;;');
  });

  it("includes commands in the pwsh script", () => {
    const script = generatePwshCompletionScript();

    expect(script).toContain("Register-ArgumentCompleter -Native -CommandName 'sitepulse'");
    expect(script).toContain("$commands = @('run', 'rollup', 'worker', 'summary', 'validate', 'help')");
  });
});
