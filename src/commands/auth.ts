/**
 * Auth Command
 * OAuth OOB 授權指令 - 產生授權網址、貼回授權碼、查看 token 狀態
 */

import { Command } from 'commander';
import { createInterface } from 'node:readline/promises';
import { Authorizer } from '../services/auth.js';
import { ConfigService } from '../services/config.js';
import { TokenStore } from '../services/token-store.js';
import { loggers } from '../lib/logger.js';
import { formatJSON, printError, resolveFormat } from '../utils/output.js';
import type { OutputFormat } from '../utils/output.js';
import type { TokenRecord } from '../types/auth.js';

function createAuthorizer(config: ConfigService = new ConfigService()): Authorizer {
  const store = new TokenStore(config.getConfigPath(), loggers.store);
  return new Authorizer(config.getCredentials(), store, { logger: loggers.auth });
}

function formatExpiry(expiresAt: number | undefined): string {
  return expiresAt === undefined ? 'never' : new Date(expiresAt).toISOString();
}

function printToken(token: TokenRecord, format: OutputFormat): void {
  if (format === 'json') {
    console.log(
      formatJSON({
        success: true,
        expiresAt: token.expiresAt !== undefined ? new Date(token.expiresAt).toISOString() : null,
        hasRefreshToken: token.refreshToken !== undefined,
      })
    );
  } else {
    console.log('✅ Authorization completed');
    console.log(`   Token expires: ${formatExpiry(token.expiresAt)}`);
  }
}

export const authCommand = new Command('auth').description('OAuth authorization (out-of-band flow)');

/**
 * teamsnap auth init <client-id> <client-secret>
 */
authCommand
  .command('init <client-id> <client-secret>')
  .description('Save OAuth application credentials to the config file')
  .action((clientId: string, clientSecret: string, _options: unknown, cmd: Command) => {
    const format = resolveFormat(cmd.optsWithGlobals().format);
    try {
      const config = new ConfigService();
      config.setCredentials(clientId, clientSecret);

      if (format === 'json') {
        console.log(formatJSON({ success: true, configPath: config.getConfigPath() }));
      } else {
        console.log(`✅ Credentials saved to ${config.getConfigPath()}`);
        console.log('   Next: teamsnap auth login');
      }
    } catch (error) {
      printError(error, format);
    }
  });

/**
 * teamsnap auth url
 */
authCommand
  .command('url')
  .description('Print the authorization URL to open in a browser')
  .option('--scope <scope>', 'Requested scope', 'read write')
  .action((options: { scope: string }, cmd: Command) => {
    const format = resolveFormat(cmd.optsWithGlobals().format);
    try {
      const url = createAuthorizer().beginAuthorization(options.scope);

      if (format === 'json') {
        console.log(formatJSON({ success: true, url }));
      } else {
        console.log('Open this URL, approve access, then run `teamsnap auth complete <code>`:\n');
        console.log(url);
      }
    } catch (error) {
      printError(error, format);
    }
  });

/**
 * teamsnap auth complete <code>
 */
authCommand
  .command('complete <code>')
  .description('Exchange an authorization code for an access token')
  .action(async (code: string, _options: unknown, cmd: Command) => {
    const format = resolveFormat(cmd.optsWithGlobals().format);
    try {
      const authorizer = createAuthorizer();
      const token = await loggers.cli.trackAsync('Authorization code exchange', () =>
        authorizer.completeAuthorization(code)
      );
      printToken(token, format);
    } catch (error) {
      printError(error, format);
    }
  });

/**
 * teamsnap auth login
 * 互動式：顯示網址後等待使用者貼回授權碼
 */
authCommand
  .command('login')
  .description('Authorize interactively: open the URL and paste the code')
  .option('--scope <scope>', 'Requested scope', 'read write')
  .action(async (options: { scope: string }, cmd: Command) => {
    const format = resolveFormat(cmd.optsWithGlobals().format);
    const rl = createInterface({ input: process.stdin, output: process.stderr });
    try {
      const authorizer = createAuthorizer();
      const url = authorizer.beginAuthorization(options.scope);

      process.stderr.write('\n🔐 TeamSnap authorization\n\n');
      process.stderr.write('1. Open this URL in your browser:\n\n');
      process.stderr.write(`   ${url}\n\n`);
      process.stderr.write('2. Approve access and copy the code shown on the page.\n\n');

      const code = await rl.question('3. Paste the authorization code: ');
      const token = await loggers.cli.trackAsync('Authorization code exchange', () =>
        authorizer.completeAuthorization(code)
      );
      printToken(token, format);
    } catch (error) {
      printError(error, format);
    } finally {
      rl.close();
    }
  });

/**
 * teamsnap auth status
 */
authCommand
  .command('status')
  .description('Show whether credentials and a token are configured')
  .action((_options: unknown, cmd: Command) => {
    const format = resolveFormat(cmd.optsWithGlobals().format);
    try {
      const config = new ConfigService();
      const configPath = config.getConfigPath();

      if (!config.hasCredentials()) {
        if (format === 'json') {
          console.log(formatJSON({ configured: false, authenticated: false, configPath }));
        } else {
          console.log(`⚠️  No credentials in ${configPath}`);
          console.log('   Run: teamsnap auth init <client-id> <client-secret>');
        }
        return;
      }

      const authorizer = createAuthorizer(config);
      const token = authorizer.getToken();
      const status = {
        configured: true,
        authenticated: token !== null,
        state: authorizer.getState(),
        tokenValid: authorizer.isTokenValid(),
        expiresAt: token?.expiresAt !== undefined ? new Date(token.expiresAt).toISOString() : null,
        configPath,
      };

      if (format === 'json') {
        console.log(formatJSON(status));
      } else {
        console.log(`Config:  ${configPath}`);
        console.log(`State:   ${status.state}`);
        if (token) {
          console.log(`Token:   ${status.tokenValid ? 'valid' : 'expired'} (expires ${formatExpiry(token.expiresAt)})`);
        } else {
          console.log('Token:   none (run `teamsnap auth login`)');
        }
      }
    } catch (error) {
      printError(error, format);
    }
  });
