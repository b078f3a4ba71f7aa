import { setTimeout as wait } from 'node:timers/promises';
import type { PhaseDelay, Sleep, TerminalOutput } from '../types';

export const defaultSleep: Sleep = (ms, signal) => wait(ms, undefined, { signal });

interface BarGraphOptions {
  columns: number;
  output: TerminalOutput;
  sleep?: Sleep;
  fill?: string;
}

interface RenderState {
  caption: string;
  filled: number;
}

/**
 * Draws `CAPTION [####      ]` one column at a time.
 *
 * The empty outline goes out first so the line is already at full width, then a
 * carriage return puts the cursor back at the start and the fill overwrites the
 * blanks. The closing bracket is never erased, so nothing depends on cursor
 * movement beyond `\r`.
 */
export class BarGraph {
  private readonly columns: number;
  private readonly output: TerminalOutput;
  private readonly sleep: Sleep;
  private readonly fill: string;

  constructor({ columns, output, sleep = defaultSleep, fill = '#' }: BarGraphOptions) {
    this.columns = columns;
    this.output = output;
    this.sleep = sleep;
    this.fill = fill;
  }

  outline(caption: string): string {
    return `${caption} [${' '.repeat(this.columns)}]`;
  }

  /**
   * Resolves once the bar is full, roughly `columns * delay` later. An aborted
   * signal rejects the pending wait and leaves the partial bar where it is.
   */
  async render(caption: string, delay: PhaseDelay, signal?: AbortSignal): Promise<void> {
    const state: RenderState = { caption, filled: 0 };

    this.output.write(this.outline(state.caption));
    this.output.write(`\r${state.caption} [`);

    while (state.filled < this.columns) {
      this.output.write(this.fill);
      state.filled++;
      await this.sleep(delay.milliseconds, signal);
    }

    this.output.write(']\n');
  }
}
