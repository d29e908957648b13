import { exec, execFile } from 'child_process';
import { promisify } from 'util';

export const execAsync = promisify(exec);
export const execFileAsync = promisify(execFile);

// nvidia-smi -q -x prints several hundred KB on multi-GPU hosts
const DEFAULT_MAX_BUFFER = 16 * 1024 * 1024;

// Owner lookups must never hold up a /gpu-info response for long
const OWNER_LOOKUP_TIMEOUT_MS = 2000;

export const UNKNOWN_OWNER = 'unknown';

/**
 * Execute a shell command and return stdout
 * Throws on non-zero exit code
 */
export async function execCommand(command: string, timeoutMs: number = 0): Promise<string> {
  const { stdout } = await execAsync(command, { timeout: timeoutMs });
  return stdout.trim();
}

/**
 * Run a binary directly (no shell) and return its raw stdout
 * Throws on spawn failure, non-zero exit code, or timeout
 */
export async function execFileCommand(
  file: string,
  args: string[],
  timeoutMs: number = 0
): Promise<string> {
  const { stdout } = await execFileAsync(file, args, {
    timeout: timeoutMs,
    maxBuffer: DEFAULT_MAX_BUFFER,
  });
  return stdout;
}

/**
 * Get the user owning a process
 * Returns UNKNOWN_OWNER if the process is gone, ps fails, or it takes too long
 */
export async function getProcessOwner(pid: number): Promise<string> {
  if (!Number.isInteger(pid) || pid <= 0) {
    return UNKNOWN_OWNER;
  }

  try {
    const user = await execCommand(`ps -o user= -p ${pid}`, OWNER_LOOKUP_TIMEOUT_MS);
    return user.length > 0 ? user : UNKNOWN_OWNER;
  } catch {
    return UNKNOWN_OWNER;
  }
}

/**
 * Run `shutdown` once on SIGTERM/SIGINT, then exit
 */
export function handleShutdownSignals(component: string, shutdown: () => Promise<void>): void {
  const onSignal = (signal: NodeJS.Signals) => {
    console.error(`[${component}] Received ${signal}, shutting down gracefully...`);
    shutdown().then(
      () => {
        console.error(`[${component}] Server closed`);
        process.exit(0);
      },
      (error) => {
        console.error(`[${component}] Shutdown failed:`, error);
        process.exit(1);
      }
    );
  };

  process.once('SIGTERM', onSignal);
  process.once('SIGINT', onSignal);
}
