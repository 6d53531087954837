/**
 * Quote a value for POSIX shells. Single quotes disable every expansion;
 * embedded single quotes are closed, escaped and reopened.
 */
export function escapeShellArg(arg: string): string {
  return `'${arg.replace(/'/g, "'\\''")}'`;
}
