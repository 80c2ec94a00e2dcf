/**
 * Kill a subprocess together with everything it spawned. The child must have
 * been started detached, as a process group leader, so a negative pid reaches
 * the whole group.
 */
export function killProcessTree(child: {
  pid?: number;
  kill(signal: NodeJS.Signals): boolean;
}): void {
  if (child.pid === undefined) return;
  try {
    process.kill(-child.pid, 'SIGKILL');
  } catch (error) {
    const gone =
      error instanceof Error && 'code' in error && error.code === 'ESRCH';
    if (!gone) {
      child.kill('SIGKILL');
    }
  }
}
