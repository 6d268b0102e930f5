const REDACTED = '***';

/**
 * Read-only snapshot of secret values, handed to the runner at the start of a run.
 * Stages never write to it.
 */
export class SecretStore {
  private readonly values: ReadonlyMap<string, string>;

  constructor(values: Record<string, string | undefined> = {}) {
    const entries = Object.entries(values).filter(
      (entry): entry is [string, string] => typeof entry[1] === 'string' && entry[1].length > 0,
    );
    this.values = new Map(entries);
  }

  /** Picks the named variables out of an environment map (e.g. process.env). */
  static fromEnv(env: NodeJS.ProcessEnv, names: readonly string[]): SecretStore {
    const picked: Record<string, string | undefined> = {};
    for (const name of names) picked[name] = env[name];
    return new SecretStore(picked);
  }

  names(): string[] {
    return [...this.values.keys()];
  }

  get(name: string): string | undefined {
    return this.values.get(name);
  }

  /** Masks every known secret value in a line of output. */
  redact(text: string): string {
    let out = text;
    for (const value of this.values.values()) {
      out = out.split(value).join(REDACTED);
    }
    return out;
  }
}
