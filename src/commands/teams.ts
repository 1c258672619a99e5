/**
 * Teams Command
 * 列出授權使用者可存取的球隊
 */

import { Command } from 'commander';
import { getApiClient } from '../lib/api-client.js';
import { parseId } from '../utils/args.js';
import { printError, printRecords, resolveFormat } from '../utils/output.js';
import type { ColumnDef } from '../utils/output.js';

const TEAM_COLUMNS: ColumnDef[] = [
  { key: 'id', label: 'ID' },
  { key: 'name', label: 'Name' },
  { key: 'sport_name', label: 'Sport' },
  { key: 'season_name', label: 'Season' },
  { key: 'division_name', label: 'Division' },
];

export const teamsCommand = new Command('teams')
  .description('List teams of the authorized user')
  .option('--user <id>', 'User ID (default: the authorized user)', parseId)
  .action(async (options: { user?: number }, cmd: Command) => {
    const format = resolveFormat(cmd.optsWithGlobals().format);
    try {
      const client = getApiClient();
      const userId = options.user ?? (await currentUserId());
      const teams = await client.teams.searchAll({ user_id: userId });
      printRecords(teams, TEAM_COLUMNS, format);
    } catch (error) {
      printError(error, format);
    }
  });

/**
 * /teams/search 需要 user_id；未指定時使用 /me
 */
async function currentUserId(): Promise<number | undefined> {
  const me = await getApiClient().getMe();
  return typeof me.data.id === 'number' ? me.data.id : undefined;
}
