import { parseArgs } from 'node:util';
import { z } from 'zod';

import {
  BibliographyReadError,
  UnknownStyleError,
  UsageError,
  createCitationResolver,
  createStyleRegistry,
  readBibliographyFile,
  readKeyList,
  REFERENCES_HEADING,
} from './citations/index.js';
import type { Bibliography, Warn } from './citations/index.js';
import { loadSettings } from './settings.js';

export type Writable = { write(chunk: string): unknown };

export type CliIo = {
  argv: string[];
  stdin: AsyncIterable<string | Uint8Array>;
  stdout: Writable;
  stderr: Writable;
  env?: Record<string, string | undefined>;
};

export const USAGE = [
  'Usage: cite-md <bib-file> [style] [--keys]',
  '',
  'Reads a Markdown document with \\cite{key1,key2} markers from stdin, replaces',
  'them with numbered references and appends a "## References" section.',
  '',
  'Options:',
  '  --keys      read a newline-delimited key list instead of a document and',
  '              print only the reference list',
  '  -h, --help  show this message',
  '',
  'Example: cat doc.md | cite-md refs.bib numbered > new_doc.md',
].join('\n');

const argsSchema = z.object({
  positionals: z
    .array(z.string())
    .min(1, 'Missing bibliography file argument')
    .max(2, 'Too many arguments'),
  keys: z.boolean(),
});

type CliArgs = {
  bibPath: string;
  style: string | undefined;
  keysMode: boolean;
  help: boolean;
};

function parseRawArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        keys: { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

export function parseCliArgs(argv: string[]): CliArgs {
  const parsed = parseRawArgs(argv);

  if (parsed.values.help) {
    return { bibPath: '', style: undefined, keysMode: false, help: true };
  }

  const result = argsSchema.safeParse({
    positionals: parsed.positionals,
    keys: parsed.values.keys ?? false,
  });
  if (!result.success) {
    throw new UsageError(result.error.issues.map((issue) => issue.message).join('; '));
  }

  const [bibPath = '', style] = result.data.positionals;
  return { bibPath, style, keysMode: result.data.keys, help: false };
}

async function readAll(stream: AsyncIterable<string | Uint8Array>): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString('utf8');
}

export async function runCli(io: CliIo): Promise<number> {
  const { stdout, stderr } = io;
  const fail = (message: string, code: number) => {
    stderr.write(`Error: ${message}\n`);
    return code;
  };

  let args: CliArgs;
  try {
    args = parseCliArgs(io.argv);
  } catch (error) {
    if (error instanceof UsageError) {
      stderr.write(`${USAGE}\n`);
      return fail(error.message, 2);
    }
    throw error;
  }

  if (args.help) {
    stdout.write(`${USAGE}\n`);
    return 0;
  }

  const settings = loadSettings(io.env ?? process.env);
  const registry = createStyleRegistry();
  const style = args.style ?? settings.defaultStyle;
  try {
    registry.get(style);
  } catch (error) {
    if (error instanceof UnknownStyleError) return fail(error.message, 2);
    throw error;
  }

  const warn: Warn = settings.quiet ? () => {} : (message) => stderr.write(`Warning: ${message}\n`);

  let bibliography: Bibliography;
  try {
    bibliography = readBibliographyFile(args.bibPath, { warn });
  } catch (error) {
    if (error instanceof BibliographyReadError) return fail(error.message, 1);
    throw error;
  }

  let input: string;
  try {
    input = await readAll(io.stdin);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return fail(`Could not read from standard input: ${reason}`, 1);
  }

  const resolver = createCitationResolver({ registry, warn });

  if (args.keysMode) {
    const references = resolver.formatReferenceList(readKeyList(input), bibliography, style);
    if (references.length > 0) {
      stdout.write(`${REFERENCES_HEADING}\n${references.join('; ')}\n`);
    }
    return 0;
  }

  const resolved = resolver.resolve(input, bibliography, style);
  stdout.write(`${resolved.text}\n`);
  return 0;
}
