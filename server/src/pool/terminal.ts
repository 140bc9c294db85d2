import path from 'node:path';

export interface Disposable {
  dispose(): void;
}

/**
 * A child process attached to a pseudo-terminal. This is the subset of
 * node-pty's `IPty` the pool relies on.
 */
export interface TerminalProcess {
  readonly pid: number;
  write(data: string): void;
  resize(cols: number, rows: number): void;
  pause(): void;
  resume(): void;
  kill(signal?: string): void;
  onData(listener: (data: string) => void): Disposable;
  onExit(listener: (event: { exitCode: number; signal?: number }) => void): Disposable;
}

export interface SpawnRequest {
  script: string;
  slot: number;
  cols: number;
  rows: number;
}

export type TerminalSpawner = (request: SpawnRequest) => Promise<TerminalProcess>;

export const SLOT_ENV_VAR = 'SESSION_NUMBER';

export function buildEnv(slot: number, base: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(base)) {
    if (value !== undefined) env[key] = value;
  }
  env[SLOT_ENV_VAR] = String(slot);
  return env;
}

/**
 * Runs `bash <script>` on a fresh pty. node-pty starts the child as a
 * session leader, so its pid is also its process group id.
 */
export const spawnPtyTerminal: TerminalSpawner = async (request) => {
  const nodePty = await import('node-pty');
  const script = path.resolve(request.script);
  return nodePty.spawn('bash', [script], {
    name: 'vt100',
    cols: request.cols,
    rows: request.rows,
    cwd: path.dirname(script),
    env: buildEnv(request.slot),
  });
};

/** Signals the whole process group led by `pid`. */
export function signalProcessGroup(pid: number, signal: NodeJS.Signals): void {
  process.kill(-pid, signal);
}
