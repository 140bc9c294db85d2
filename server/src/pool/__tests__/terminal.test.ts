import { describe, it, expect, vi, beforeEach } from 'vitest';
import path from 'node:path';
import * as nodePty from 'node-pty';
import { buildEnv, spawnPtyTerminal, SLOT_ENV_VAR } from '../terminal.js';

const mockPty = {
  pid: 31337,
  onData: vi.fn(),
  onExit: vi.fn(),
  write: vi.fn(),
  resize: vi.fn(),
  pause: vi.fn(),
  resume: vi.fn(),
  kill: vi.fn(),
};

vi.mock('node-pty', () => ({
  spawn: vi.fn(() => mockPty),
}));

describe('buildEnv', () => {
  it('adds the slot number to the inherited environment', () => {
    const env = buildEnv(5, { PATH: '/usr/bin', HOME: '/home/sim', EMPTY: undefined });
    expect(env).toEqual({ PATH: '/usr/bin', HOME: '/home/sim', [SLOT_ENV_VAR]: '5' });
  });

  it('overrides a stale slot number', () => {
    expect(buildEnv(0, { SESSION_NUMBER: '7' }).SESSION_NUMBER).toBe('0');
  });
});

describe('spawnPtyTerminal', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('runs the script with bash from its own directory', async () => {
    const terminal = await spawnPtyTerminal({ script: '/opt/simulator/do.sh', slot: 3, cols: 80, rows: 24 });

    expect(terminal.pid).toBe(31337);
    const spawn = vi.mocked(nodePty.spawn);
    expect(spawn).toHaveBeenCalledTimes(1);
    const [file, args, options] = spawn.mock.calls[0];
    expect(file).toBe('bash');
    expect(args).toEqual(['/opt/simulator/do.sh']);
    expect(options).toMatchObject({ name: 'vt100', cols: 80, rows: 24, cwd: '/opt/simulator' });
    expect(options?.env?.[SLOT_ENV_VAR]).toBe('3');
  });

  it('resolves a relative script against the working directory', async () => {
    await spawnPtyTerminal({ script: 'sim/do.sh', slot: 0, cols: 80, rows: 24 });

    const [, args, options] = vi.mocked(nodePty.spawn).mock.calls[0];
    expect(args).toEqual([path.resolve('sim/do.sh')]);
    expect(options?.cwd).toBe(path.dirname(path.resolve('sim/do.sh')));
  });
});
