export type RigLogType = 'info' | 'warn' | 'error';

export type RigWarningCode =
  | 'degenerate-direction'
  | 'degenerate-chain'
  | 'degenerate-segment'
  | 'zero-length-bone'
  | 'unresolved-relink'
  | 'unhandled-rig-type';

export interface RigLogEntry {
  type: RigLogType;
  message: string;
  code?: RigWarningCode;
  bone?: string;
  generator?: string;
  node?: string;
}

export interface RigLogOptions {
  echo?: boolean;
  maxEntries?: number;
}

const formatEntry = (entry: RigLogEntry): string => {
  const context = [entry.generator, entry.bone, entry.node].filter(Boolean).join(' ');
  return context ? `[rig] ${context}: ${entry.message}` : `[rig] ${entry.message}`;
};

export class RigLog {
  private entries: RigLogEntry[] = [];
  private readonly echo: boolean;
  private readonly maxEntries: number;

  constructor(options: RigLogOptions = {}) {
    this.echo = options.echo ?? false;
    this.maxEntries = options.maxEntries ?? 5000;
  }

  info(message: string, context: Omit<RigLogEntry, 'type' | 'message'> = {}): void {
    this.push({ type: 'info', message, ...context });
  }

  warn(code: RigWarningCode, message: string, context: Omit<RigLogEntry, 'type' | 'message' | 'code'> = {}): void {
    this.push({ type: 'warn', code, message, ...context });
  }

  error(message: string, context: Omit<RigLogEntry, 'type' | 'message'> = {}): void {
    this.push({ type: 'error', message, ...context });
  }

  getEntries(type?: RigLogType): RigLogEntry[] {
    return type ? this.entries.filter((entry) => entry.type === type) : [...this.entries];
  }

  private push(entry: RigLogEntry): void {
    if (this.entries.length >= this.maxEntries) {
      this.entries.shift();
    }
    this.entries.push(entry);

    if (!this.echo) return;
    const text = formatEntry(entry);
    if (entry.type === 'error') {
      console.error(text);
    } else if (entry.type === 'warn') {
      console.warn(text);
    } else {
      console.info(text);
    }
  }
}
