/**
 * Session information and environment for a runner, created once at startup
 * and handed to the bridge with `setContext()`.
 */
export class RunnerContext {
  readonly sessionId: string;
  readonly workspacePath: string;
  readonly environment: Readonly<Record<string, string | undefined>>;
  readonly #metadata = new Map<string, unknown>();

  constructor(options: {
    sessionId: string;
    workspacePath: string;
    /** Overrides merged over `process.env`. */
    environment?: Record<string, string | undefined>;
  }) {
    this.sessionId = options.sessionId;
    this.workspacePath = options.workspacePath;
    this.environment = { ...process.env, ...options.environment };
  }

  getEnv(key: string): string | undefined;
  getEnv(key: string, defaultValue: string): string;
  getEnv(key: string, defaultValue?: string): string | undefined {
    return this.environment[key] ?? defaultValue;
  }

  setMetadata(key: string, value: unknown): void {
    this.#metadata.set(key, value);
  }

  getMetadata(key: string): unknown {
    return this.#metadata.get(key);
  }
}
