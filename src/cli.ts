/**
 * cli.ts - Demo command: list everyone visible to a cookie session.
 *
 *   tsx src/cli.ts cookies.txt me@example.com --nickname Johnny
 */

import util from 'util';
import { Command, InvalidArgumentError } from 'commander';
import { personDateTime } from './decoders';
import { DEFAULT_ACCOUNT, LocationSharingService } from './locationSharingService';
import type { Person } from './core/types';

interface CliOptions {
  nickname?: string;
  retries?: number;
  cache: boolean;
  timeout: number;
  json?: boolean;
}

function wrapAction<T extends unknown[]>(
  handler: (...args: T) => Promise<void>,
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await handler(...args);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Error: ${message}`);
      process.exitCode = 1;
    }
  };
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function toRow(person: Person): Record<string, unknown> {
  return {
    name: person.fullName ?? person.id,
    nickname: person.nickname ?? '',
    latitude: person.latitude,
    longitude: person.longitude,
    seen: personDateTime(person)?.toISO() ?? '',
    battery: person.batteryLevel === null ? '' : `${person.batteryLevel}%`,
    charging: person.charging,
    address: person.address ?? '',
  };
}

function output(value: unknown, asJson = false): void {
  if (asJson) {
    console.log(JSON.stringify(value, null, 2));
    return;
  }

  if (Array.isArray(value)) {
    if (value.length === 0) {
      console.log('(empty)');
      return;
    }
    console.table(value);
    return;
  }

  console.log(util.inspect(value, { colors: false, depth: 6 }));
}

const program = new Command();

program
  .name('locshare')
  .description('Print the people sharing their location with a cookie session')
  .argument('<cookies>', 'Netscape-format cookie file')
  .argument('[account]', 'signed-in account, shown as your own entry', DEFAULT_ACCOUNT)
  .option('-n, --nickname <name>', 'also print coordinates for this nickname')
  .option('-r, --retries <count>', 'attempts per fetch', parsePositiveInt)
  .option('-t, --timeout <seconds>', 'give up after this many seconds', parsePositiveInt, 10)
  .option('--no-cache', 'fetch on every call')
  .option('--json', 'print JSON instead of a table')
  .action(
    wrapAction(async (cookies: string, account: string, opts: CliOptions) => {
      const service = await LocationSharingService.connect({
        cookiesFilePath: cookies,
        authenticatingAccount: account,
        maxRetries: opts.retries,
        disableCache: !opts.cache,
      });

      try {
        const signal = AbortSignal.timeout(opts.timeout * 1000);
        const people = await service.getAllPeople(signal);
        output(opts.json ? people : people.map(toRow), opts.json);

        if (opts.nickname) {
          const coords = await service.getCoordinatesByNickname(opts.nickname, signal);
          if (coords.latitude !== null) {
            console.log(`Nickname '${opts.nickname}' => ${coords.latitude},${coords.longitude}`);
          } else {
            console.log(`Nickname '${opts.nickname}' not found.`);
          }
        }
      } finally {
        await service.close();
      }
    }),
  );

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
