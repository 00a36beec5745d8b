export interface ParsedCommand {
  /** Lowercased, without the leading slash or a `@botname` suffix. */
  command: string;
  args: Record<string, string>;
}

const ARG_PATTERN = /([A-Za-z_]+)=(?:"([^"]*)"|(\S+))/g;

/**
 * `/test topic="Plane geometry" n=5 time=8` ->
 * `{ command: 'test', args: { topic: 'Plane geometry', n: '5', time: '8' } }`.
 * Returns null for text that is not a command.
 */
export function parseCommand(text: string): ParsedCommand | null {
  const trimmed = text.trim();
  if (!trimmed.startsWith('/')) return null;

  const [head] = trimmed.split(/\s+/, 1);
  const command = head.slice(1).split('@')[0].toLowerCase();
  const args: Record<string, string> = {};
  for (const match of trimmed.slice(head.length).matchAll(ARG_PATTERN)) {
    args[match[1].toLowerCase()] = match[2] ?? match[3];
  }
  return { command, args };
}

/** Non-negative integer argument, or `fallback` when absent or malformed. */
export function intArg(args: Record<string, string>, key: string, fallback: number): number {
  const raw = args[key];
  if (raw === undefined || !/^\d+$/.test(raw)) return fallback;
  return Number(raw);
}
