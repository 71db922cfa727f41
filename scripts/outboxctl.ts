/**
 * Usage examples:
 *
 * Pending and dead-letter counts:
 * npm run outboxctl -- --stats
 *
 * List dead letters:
 * npm run outboxctl -- --list --limit 20
 *
 * Show one dead letter:
 * npm run outboxctl -- --show 6f1c2f7e-0000-4000-8000-000000000000
 *
 * Requeue a dead letter for delivery (dry run first):
 * npm run outboxctl -- --requeue 6f1c2f7e-0000-4000-8000-000000000000 --dryRun
 */

import { DeliveryOutbox } from '../src/outbox/outbox';
import { createStateStore } from '../src/store';

type Command = 'stats' | 'list' | 'show' | 'requeue';

type ParsedArgs = {
  command?: Command;
  eventId?: string;
  limit: number;
  dryRun: boolean;
};

const DEFAULT_LIMIT = 50;

function takeValue(argv: string[], index: number, flag: string): string {
  const value = argv[index + 1];
  if (!value || value.startsWith('--')) {
    throw new Error(`missing value for ${flag}`);
  }
  return value;
}

function setCommand(parsed: ParsedArgs, command: Command): void {
  if (parsed.command && parsed.command !== command) {
    throw new Error(`--${parsed.command} and --${command} cannot be combined`);
  }
  parsed.command = command;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = { limit: DEFAULT_LIMIT, dryRun: false };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === '--dryRun') {
      parsed.dryRun = true;
      continue;
    }
    if (arg === '--stats') {
      setCommand(parsed, 'stats');
      continue;
    }
    if (arg === '--list') {
      setCommand(parsed, 'list');
      continue;
    }
    if (arg === '--show' || arg === '--requeue') {
      setCommand(parsed, arg === '--show' ? 'show' : 'requeue');
      parsed.eventId = takeValue(argv, i, arg);
      i += 1;
      continue;
    }
    if (arg === '--limit') {
      const limit = Number.parseInt(takeValue(argv, i, arg), 10);
      if (!Number.isInteger(limit) || limit <= 0) {
        throw new Error('--limit must be a positive integer');
      }
      parsed.limit = limit;
      i += 1;
      continue;
    }
    throw new Error(`unknown argument: ${arg}`);
  }

  return parsed;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (!args.command) {
    throw new Error('expected one of --stats, --list, --show <eventId>, --requeue <eventId>');
  }

  const store = createStateStore();
  const outbox = new DeliveryOutbox({ store });
  try {
    switch (args.command) {
      case 'stats': {
        const stats = await outbox.stats();
        process.stdout.write(`pending: ${stats.pending}\ndead: ${stats.dead}\n`);
        return;
      }
      case 'list': {
        const letters = await outbox.listDeadLetters(args.limit);
        if (letters.length === 0) {
          process.stdout.write('No dead letters.\n');
          return;
        }
        for (const letter of letters) {
          process.stdout.write(
            `${letter.eventId}  call=${letter.callId}  retries=${letter.retryCount}  `
              + `dead_at=${letter.deadLetteredAt}  last_error=${letter.lastError ?? '-'}\n`,
          );
        }
        return;
      }
      case 'show': {
        const letter = args.eventId ? await outbox.getDeadLetter(args.eventId) : null;
        if (!letter) {
          throw new Error(`dead letter not found: ${args.eventId ?? ''}`);
        }
        process.stdout.write(`${JSON.stringify(letter, null, 2)}\n`);
        return;
      }
      case 'requeue': {
        const eventId = args.eventId ?? '';
        const letter = await outbox.getDeadLetter(eventId);
        if (!letter) {
          throw new Error(`dead letter not found: ${eventId}`);
        }
        process.stdout.write(`Event: ${eventId}\n  call: ${letter.callId}\n  destination: ${letter.destinationUrl}\n`);
        if (args.dryRun) {
          process.stdout.write('Dry run: no changes written.\n');
          return;
        }
        await outbox.requeueDeadLetter(eventId);
        process.stdout.write('Dead letter requeued.\n');
        return;
      }
    }
  } finally {
    await store.close();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    process.exit(1);
  });
}
