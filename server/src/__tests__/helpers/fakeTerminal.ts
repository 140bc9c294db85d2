import type { Disposable, TerminalProcess } from '../../pool/terminal.js';

type ExitEvent = { exitCode: number; signal?: number };

/** In-memory stand-in for a node-pty process. */
export class FakeTerminal implements TerminalProcess {
  readonly writes: string[] = [];
  readonly resizes: Array<[number, number]> = [];
  readonly signals: string[] = [];
  pauseCount = 0;
  resumeCount = 0;
  paused = false;
  exited = false;
  /** When set, writing exactly this string makes the process exit. */
  exitOnWrite: string | undefined;

  private readonly dataListeners = new Set<(data: string) => void>();
  private readonly exitListeners = new Set<(event: ExitEvent) => void>();

  constructor(readonly pid = 4242) {}

  write(data: string): void {
    this.writes.push(data);
    if (this.exitOnWrite !== undefined && data === this.exitOnWrite) {
      this.exit(0);
    }
  }

  resize(cols: number, rows: number): void {
    this.resizes.push([cols, rows]);
  }

  pause(): void {
    this.pauseCount += 1;
    this.paused = true;
  }

  resume(): void {
    this.resumeCount += 1;
    this.paused = false;
  }

  kill(signal = 'SIGHUP'): void {
    this.signals.push(signal);
    this.exit(0, 15);
  }

  onData(listener: (data: string) => void): Disposable {
    this.dataListeners.add(listener);
    return { dispose: () => this.dataListeners.delete(listener) };
  }

  onExit(listener: (event: ExitEvent) => void): Disposable {
    this.exitListeners.add(listener);
    return { dispose: () => this.exitListeners.delete(listener) };
  }

  /** Simulates the process printing `data`. */
  emit(data: string): void {
    this.dataListeners.forEach((listener) => listener(data));
  }

  exit(exitCode = 0, signal?: number): void {
    if (this.exited) return;
    this.exited = true;
    this.exitListeners.forEach((listener) => listener({ exitCode, signal }));
  }
}
