/**
 * Render a program and its arguments as a shell-style command line for logging
 */
export function formatCommandLine(program: string, args: string[]): string {
  const quoted = args.map((arg) =>
    arg === "" || /[\s"]/.test(arg) ? `"${arg.replace(/"/g, '\\"')}"` : arg,
  );
  return [program, ...quoted].join(" ");
}
