export type KeyBuilderOptions = {
  prefix?: string;
};

/** Maps caller keys to wire keys by prepending the client's `keyPrefix` verbatim. */
export class KeyBuilder {
  private readonly prefix: string;

  constructor(options: KeyBuilderOptions = {}) {
    this.prefix = options.prefix ?? '';
  }

  qualify(key: string): string {
    return `${this.prefix}${key}`;
  }
}
