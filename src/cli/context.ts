import type { ArchiveSession } from '../session/ArchiveSession';

export interface CliContext {
  session: ArchiveSession;
  stdin: NodeJS.ReadableStream;
  /** Writes one line of command output to stdout. */
  write: (line: string) => void;
}

export type Command = (argv: string[], context: CliContext) => Promise<number>;
