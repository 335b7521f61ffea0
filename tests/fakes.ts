import type { Transport } from "../src/transport.js";

/**
 * Scripted outcome of the next request: an error, no answer at all, or
 * null for a normal answer.
 */
export type Failure = Error | "hang" | null;

/**
 * In-process transport over a sparse register bank. Requests succeed
 * unless a failure is queued for them.
 */
export class FakeTransport implements Transport {
  readonly registers = new Map<number, number>();
  readonly requests: string[] = [];
  readonly failures: Failure[] = [];
  connectError: Error | null = null;
  connects = 0;
  closes = 0;

  private gate: Promise<void> | null = null;

  setWords(address: number, words: readonly number[]): void {
    words.forEach((word, i) => this.registers.set(address + i, word));
  }

  /** Hold every request until the returned function is called. */
  hold(): () => void {
    let release = () => {};
    this.gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    return () => {
      this.gate = null;
      release();
    };
  }

  async connect(): Promise<void> {
    this.connects++;
    if (this.connectError) throw this.connectError;
  }

  async close(): Promise<void> {
    this.closes++;
  }

  async readRegisters(address: number, count: number): Promise<number[]> {
    this.requests.push(`read ${address}+${count}`);
    await this.next();
    return Array.from({ length: count }, (_, i) => this.registers.get(address + i) ?? 0);
  }

  async writeRegisters(address: number, words: readonly number[]): Promise<void> {
    this.requests.push(`write ${address}=${words.join(",")}`);
    await this.next();
    this.setWords(address, words);
  }

  private async next(): Promise<void> {
    if (this.gate) await this.gate;
    const failure = this.failures.shift();
    if (failure === "hang") return new Promise<void>(() => {});
    if (failure) throw failure;
  }
}
