interface HelpRenderOptions {
  color: boolean;
  version?: string;
}

export function renderHelp(options: HelpRenderOptions): string {
  const style = createStyle(options.color);
  const lines = [
    style.title("bkpfile"),
    style.subtle("Timestamped, note-annotated backups of a single file."),
    "",
    style.label("Usage"),
    `  ${style.command("bkpfile [options] FILE_PATH [NOTE]")}`,
    "",
    style.label("Options"),
    `  ${style.command("--dry-run")}              Show what would be done without creating backups`,
    `  ${style.command("--list")}                 List all backups for the specified file`,
    `  ${style.command("--config")}               Display computed configuration values and exit`,
    `  ${style.command("-h, --help")}             Show this help`,
    `  ${style.command("-v, --version")}          Show version`,
    `  ${style.command("--debug")}                Write debug output to stderr`,
    `  ${style.command("--log-file[=path]")}      Also append debug output to a file`,
    "                         (default: bkpfile-debug.log)",
    "",
    style.label("Configuration"),
    `  ${style.command("BKPFILE_CONFIG")}         Colon-separated list of config files`,
    "                         (default: ./.bkpfile.yml:~/.bkpfile.yml)",
    "",
    style.label("Examples"),
    `  ${style.command('bkpfile notes.txt "before refactor"')}`,
    `  ${style.command("bkpfile --list notes.txt")}`,
    `  ${style.command("bkpfile --config")}`,
  ];

  if (options.version) {
    lines.push("", style.subtle(`Version: ${options.version}`));
  }
  return lines.join("\n");
}

export function createStyle(color: boolean) {
  return {
    title: (text: string) => paint(color, text, "36"),
    label: (text: string) => paint(color, paint(color, text, "1"), "33"),
    command: (text: string) => paint(color, text, "32"),
    subtle: (text: string) => paint(color, text, "2"),
    path: (text: string) => paint(color, text, "1"),
    error: (text: string) => paint(color, text, "31"),
  };
}

function paint(color: boolean, text: string, code: string): string {
  return color ? `\u001b[${code}m${text}\u001b[0m` : text;
}
