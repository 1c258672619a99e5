/**
 * Members Command
 * 列出球隊成員
 */

import { Command } from 'commander';
import { getApiClient } from '../lib/api-client.js';
import { parseId } from '../utils/args.js';
import { printError, printRecords, resolveFormat } from '../utils/output.js';
import type { ColumnDef } from '../utils/output.js';

const MEMBER_COLUMNS: ColumnDef[] = [
  { key: 'id', label: 'ID' },
  { key: 'first_name', label: 'First name' },
  { key: 'last_name', label: 'Last name' },
  { key: 'is_manager', label: 'Manager' },
  { key: 'is_non_player', label: 'Non-player' },
];

export const membersCommand = new Command('members')
  .description('List members of a team')
  .requiredOption('-t, --team <id>', 'Team ID', parseId)
  .action(async (options: { team: number }, cmd: Command) => {
    const format = resolveFormat(cmd.optsWithGlobals().format);
    try {
      const members = await getApiClient().members.searchAll({ team_id: options.team });
      printRecords(members, MEMBER_COLUMNS, format);
    } catch (error) {
      printError(error, format);
    }
  });
