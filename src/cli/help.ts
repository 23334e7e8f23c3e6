import { SUPPORTED_CLI_COMMANDS } from "./commands";

const PRIMARY_COMMANDS = [
  {
    name: "run" as const,
    summary: "Probe every configured target on its interval until SIGINT or SIGTERM.",
  },
  {
    name: "rollup" as const,
    summary: "Run one retention cycle and print its report. Exits 1 when another holder has the lock.",
  },
  {
    name: "worker" as const,
    summary: "Start a worker node that runs probes for a distributed backend.",
  },
  {
    name: "summary" as const,
    summary: "Print per-target results of the trailing 24 hours as JSON.",
  },
  {
    name: "validate" as const,
    summary: "Check the configuration and print the resolved settings with secrets masked.",
  },
  {
    name: "help" as const,
    summary: "Show this help message and exit.",
  },
] as const;

const GLOBAL_OPTIONS = [
  {
    flag: "--config <path>",
    description: "Configuration file (default: $SITEPULSE_CONFIG or ./sitepulse.yaml).",
  },
  {
    flag: "--log-level <level>",
    description: "One of debug, info, warn, error. Overrides log_level from the file.",
  },
  {
    flag: "--listen <host:port>",
    description: "Address the worker node binds to. Overrides worker.listen.",
  },
  {
    flag: "--completion=<bash|zsh|pwsh>",
    description: "Print a shell completion script.",
  },
  {
    flag: "--version, -v",
    description: "Print the version and exit.",
  },
  {
    flag: "--help, -h",
    description: "Show this help message and exit.",
  },
] as const;

const EXAMPLES = [
  "sitepulse run --config ./sitepulse.yaml",
  "sitepulse worker --config ./sitepulse.yaml --listen 0.0.0.0:7400",
  "sitepulse rollup --log-level debug",
  "sitepulse summary --config /etc/sitepulse/sitepulse.yaml",
] as const;

const COMPLETION_FLAGS = ["--config", "--log-level", "--listen", "--version", "-v", "--help", "-h"] as const;

function formatColumns(rows: readonly { left: string; right: string }[], padding = 2): string {
  const leftWidth = rows.reduce((max, row) => Math.max(max, row.left.length), 0);

  return rows
    .map((row) => {
      const left = row.left.padEnd(leftWidth + padding, " ");
      return `${left}${row.right}`.trimEnd();
    })
    .join("\n");
}

function joinLines(lines: readonly string[]): string {
  return `${lines.join("\n")}\n`;
}

export function renderCliHelp(): string {
  const sections: string[] = [];

  sections.push("sitepulse - HTTP endpoint monitoring with phase timings and daily rollups");
  sections.push("");
  sections.push("Usage:");
  sections.push("  sitepulse <command> [options]");
  sections.push("");
  sections.push("Commands:");
  sections.push(
    formatColumns(
      PRIMARY_COMMANDS.map(({ name, summary }) => ({
        left: `  ${name}`,
        right: summary,
      })),
    ),
  );
  sections.push("");
  sections.push("Options:");
  sections.push(
    formatColumns(
      GLOBAL_OPTIONS.map(({ flag, description }) => ({
        left: `  ${flag}`,
        right: description,
      })),
    ),
  );
  sections.push("");
  sections.push("Examples:");

  for (const example of EXAMPLES) {
    sections.push(`  $ ${example}`);
  }

  return joinLines(sections);
}

export function generateBashCompletionScript(): string {
  const commandList = SUPPORTED_CLI_COMMANDS.join(" ");
  const flagList = COMPLETION_FLAGS.join(" ");

  const lines = [
    "#!/usr/bin/env bash",
    "_sitepulse()",
    "{",
    "  local cur prev",
    "  COMPREPLY=()",
    '  cur="${COMP_WORDS[COMP_CWORD]}"',
    '  prev="${COMP_WORDS[COMP_CWORD-1]}"',
    "",
    "  if [[ ${COMP_CWORD} -eq 1 ]]; then",
    `    COMPREPLY=( $(compgen -W "${commandList}" -- "$cur") )`,
    "    return 0",
    "  fi",
    "",
    '  case "$prev" in',
    "    --config)",
    '      COMPREPLY=( $(compgen -f -- "$cur") )',
    "      return 0",
    "      ;;",
    "    --log-level)",
    '      COMPREPLY=( $(compgen -W "debug info warn error" -- "$cur") )',
    "      return 0",
    "      ;;",
    "  esac",
    "",
    `  COMPREPLY=( $(compgen -W "${flagList}" -- "$cur") )`,
    "  return 0",
    "}",
    "complete -F _sitepulse sitepulse",
  ];

  return joinLines(lines);
}

export function generateZshCompletionScript(): string {
  const commandList = SUPPORTED_CLI_COMMANDS.join(" ");
  const optionLines = GLOBAL_OPTIONS.map(({ flag, description }) => {
    const primaryFlag = flag.split(/[ ,=]/)[0] ?? flag;
    return `    "${primaryFlag}[${description}]"`;
  });

  const lines = [
    "#compdef sitepulse",
    "",
    "_arguments \\",
    `  "1:command:(${commandList})" \\`,
    '  "*::options:->options"',
    "",
    "case $state in",
    "  (options)",
    "    _arguments \\",
    ...optionLines.slice(0, -1).map((entry) => `${entry} \\`),
    ...optionLines.slice(-1),
    "    ;;",
    "esac",
  ];

  return joinLines(lines);
}

export function generatePwshCompletionScript(): string {
  const commandList = SUPPORTED_CLI_COMMANDS.map((command) => `'${command}'`).join(", ");
  const flagList = COMPLETION_FLAGS.map((flag) => `'${flag}'`).join(", ");

  const lines = [
    "Register-ArgumentCompleter -Native -CommandName 'sitepulse' -ScriptBlock {",
    "  param($wordToComplete, $commandAst, $cursorPosition)",
    "",
    `  $commands = @(${commandList})`,
    `  $options = @(${flagList})`,
    "",
    "  if ($commandAst.CommandElements.Count -le 1) {",
    "    foreach ($item in $commands) {",
    '      if ($item -like "$wordToComplete*") {',
    "        [System.Management.Automation.CompletionResult]::new($item, $item, 'ParameterValue', $item)",
    "      }",
    "    }",
    "    return",
    "  }",
    "",
    "  foreach ($option in $options) {",
    '    if ($option -like "$wordToComplete*") {',
    "      [System.Management.Automation.CompletionResult]::new($option, $option, 'ParameterName', $option)",
    "    }",
    "  }",
    "}",
  ];

  return joinLines(lines);
}
