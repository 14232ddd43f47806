// Quote one word for the `sh -c` line tmux runs inside an instance window.
export function quoteShellArg(arg: string): string {
  if (arg === "") {
    return "''";
  }

  if (/["'\s;|&$`\\()<>*?#~!{}[\]]/.test(arg)) {
    return `'${arg.replace(/'/g, "'\\''")}'`;
  }

  return arg;
}

export function joinShellArgs(args: string[]): string {
  return args.map(quoteShellArg).join(" ");
}
