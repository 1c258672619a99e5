/**
 * Events Command
 * 列出球隊賽事與練習
 */

import { Command } from 'commander';
import { getApiClient } from '../lib/api-client.js';
import { parseId } from '../utils/args.js';
import { printError, printRecords, resolveFormat } from '../utils/output.js';
import type { ColumnDef } from '../utils/output.js';

const EVENT_COLUMNS: ColumnDef[] = [
  { key: 'id', label: 'ID' },
  { key: 'name', label: 'Name' },
  { key: 'start_date', label: 'Start' },
  { key: 'is_game', label: 'Game' },
  { key: 'location_name', label: 'Location' },
  { key: 'opponent_name', label: 'Opponent' },
];

export const eventsCommand = new Command('events')
  .description('List events of a team')
  .requiredOption('-t, --team <id>', 'Team ID', parseId)
  .option('--after <date>', 'Only events starting after this ISO date')
  .option('--before <date>', 'Only events starting before this ISO date')
  .action(async (options: { team: number; after?: string; before?: string }, cmd: Command) => {
    const format = resolveFormat(cmd.optsWithGlobals().format);
    try {
      const events = await getApiClient().events.searchAll({
        team_id: options.team,
        started_after: options.after,
        started_before: options.before,
      });
      printRecords(events, EVENT_COLUMNS, format);
    } catch (error) {
      printError(error, format);
    }
  });
