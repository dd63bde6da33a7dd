import { randomBytes } from 'crypto';

const TIME_WIDTH = 9;
const COUNTER_WIDTH = 4;

export interface ChangesetIdGeneratorOptions {
  clock?: () => number;
  /** Random suffix source, hex encoded */
  random?: () => string;
}

/**
 * Produces `<ms-base36>-<counter-base36>-<random hex>` identifiers. Ids from
 * one generator sort in creation order, including several within the same
 * millisecond or after the clock steps backwards.
 */
export class ChangesetIdGenerator {
  private readonly clock: () => number;
  private readonly random: () => string;
  private lastTime = 0;
  private counter = 0;

  constructor(options: ChangesetIdGeneratorOptions = {}) {
    this.clock = options.clock ?? Date.now;
    this.random = options.random ?? (() => randomBytes(3).toString('hex'));
  }

  next(): string {
    const now = this.clock();
    if (now > this.lastTime) {
      this.lastTime = now;
      this.counter = 0;
    } else {
      this.counter++;
    }
    const time = this.lastTime.toString(36).padStart(TIME_WIDTH, '0');
    const counter = this.counter.toString(36).padStart(COUNTER_WIDTH, '0');
    return `${time}-${counter}-${this.random()}`;
  }
}

const CHANGESET_ID = /^[0-9a-z]+-[0-9a-z]+-[0-9a-f]+$/;

export function isChangesetId(value: string): boolean {
  return CHANGESET_ID.test(value);
}

export const defaultIdGenerator = new ChangesetIdGenerator();
