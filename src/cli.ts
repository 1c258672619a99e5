import { Command } from 'commander';
import { authCommand } from './commands/auth.js';
import { teamsCommand } from './commands/teams.js';
import { membersCommand } from './commands/members.js';
import { eventsCommand } from './commands/events.js';
import { apiCommand } from './commands/api.js';
import { loggers } from './lib/logger.js';

export const cli = new Command();

cli
  .name('teamsnap')
  .description('TeamSnap API client: OAuth out-of-band authorization and read queries')
  .version('0.1.0');

// 全域選項
cli
  .option('-f, --format <format>', 'Output format: json (default) | table', 'json')
  .option('-v, --verbose', 'Log requests to stderr');

cli.hook('preAction', (thisCommand) => {
  if (thisCommand.opts().verbose) {
    for (const logger of Object.values(loggers)) {
      logger.setMinLevel('debug');
    }
  }
});

// 註冊指令
cli.addCommand(authCommand);
cli.addCommand(teamsCommand);
cli.addCommand(membersCommand);
cli.addCommand(eventsCommand);
cli.addCommand(apiCommand);
