export type OptionEntry = readonly [label: string, deviceValue: number];

export class UnknownOptionError extends Error {
  constructor(readonly axis: string, readonly label: string) {
    super(`Invalid ${axis} option: ${label}`);
    this.name = 'UnknownOptionError';
  }
}

/**
 * A closed, ordered mapping between the labels shown to users and the values the canvas stores.
 */
export class OptionAxis {
  constructor(
    readonly name: string,
    private readonly entries: readonly OptionEntry[],
    readonly defaultLabel: string,
  ) {
  }

  get labels(): string[] {
    return this.entries.map(([label]) => label);
  }

  has(label: string): boolean {
    return this.entries.some(([candidate]) => candidate === label);
  }

  encode(label: string): number {
    const entry = this.entries.find(([candidate]) => candidate === label);
    if (!entry) {
      throw new UnknownOptionError(this.name, label);
    }
    return entry[1];
  }

  // firmware may report values the UI does not offer; those read as the default
  decode(value: number): string {
    const entry = this.entries.find(([, deviceValue]) => deviceValue === value);
    return entry ? entry[0] : this.defaultLabel;
  }
}

export const NEVER_SLEEP = -1;

export const SLEEP_DURATION = new OptionAxis('sleep duration', [
  ['12 hours', 43200],
  ['1 day', 86400],
  ['2 days', 172800],
  ['3 days', 259200],
  ['5 days', 432000],
  ['7 days', 604800],
], '1 day');

export const MAX_IDLE = new OptionAxis('max idle', [
  ['10 seconds', 10],
  ['30 seconds', 30],
  ['1 minute', 60],
  ['2 minutes', 120],
  ['3 minutes', 180],
  ['5 minutes', 300],
  ['10 minutes', 600],
  ['never sleep', NEVER_SLEEP],
], '5 minutes');

export const WAKE_SENSITIVITY = new OptionAxis('wake sensitivity', [
  ['very low', 1],
  ['low', 2],
  ['medium', 3],
  ['high', 4],
  ['very high', 5],
], 'medium');
