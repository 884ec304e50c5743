/**
 * Command-line interface: Mastodon app registration and login, manual
 * posting, and the upcoming-events commands
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { createInterface } from 'readline/promises';
import { ConfigManager, DEFAULT_CONFIG_PATH } from './services/ConfigManager.js';
import { CalendarManager } from './services/CalendarManager.js';
import { TokenStore } from './services/TokenStore.js';
import { MastodonClient, DEFAULT_SCOPES, OOB_REDIRECT_URI } from './adapters/MastodonClient.js';
import { formatEventEntry } from './utils/eventFormatter.js';
import { parseReferenceTime } from './utils/timezone.js';
import { STATUS_VISIBILITIES, type StatusOptions, type StatusVisibility } from './types/mastodon.js';
import { startServer, SERVER_NAME, SERVER_VERSION } from './startup.js';

export interface CliIO {
  /** Command output; progress and diagnostics go to stderr */
  print(line: string): void;
  /** Ask the user for a line of input */
  prompt(question: string): Promise<string>;
}

export const consoleIO: CliIO = {
  print: line => console.log(line),
  prompt: async question => {
    const rl = createInterface({ input: process.stdin, output: process.stderr });
    try {
      return await rl.question(question);
    } finally {
      rl.close();
    }
  }
};

interface GlobalOptions {
  config: string;
}

interface RegisterAppOptions {
  instance: string;
  clientName: string;
  redirectUri?: string;
  scopes?: string;
  website?: string;
}

interface LoginOptions {
  instance?: string;
  clientId: string;
  clientSecret: string;
  redirectUri?: string;
  scopes?: string;
}

interface PostOptions {
  status: string;
  visibility?: StatusVisibility;
  sensitive?: boolean;
  spoilerText?: string;
  language?: string;
  inReplyToId?: string;
}

interface UpcomingOptions {
  limit?: number;
  at?: string;
}

interface AnnounceOptions extends UpcomingOptions {
  dryRun?: boolean;
}

function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 0) {
    throw new InvalidArgumentError('Limit must be a non-negative integer.');
  }
  return limit;
}

export function createProgram(io: CliIO = consoleIO): Command {
  const program = new Command();

  program
    .name(SERVER_NAME)
    .description('A tool to sync iCal events to Mastodon')
    .version(SERVER_VERSION)
    .option('--config <path>', 'Configuration file', DEFAULT_CONFIG_PATH);

  const loadConfig = async () => {
    const { config } = program.opts<GlobalOptions>();
    return new ConfigManager(config).loadConfig();
  };

  program
    .command('register-app')
    .description('Register an application with a Mastodon instance')
    .requiredOption('-i, --instance <url>', 'Mastodon instance')
    .option('-c, --client-name <name>', 'Application name', SERVER_NAME)
    .option('-r, --redirect-uri <uri>', 'OAuth redirect URI', OOB_REDIRECT_URI)
    .option('-s, --scopes <scopes>', 'OAuth scopes', DEFAULT_SCOPES)
    .option('-w, --website <url>', 'Application website')
    .action(async (opts: RegisterAppOptions) => {
      const client = new MastodonClient(opts.instance);
      const credentials = await client.registerApp({
        clientName: opts.clientName,
        redirectUri: opts.redirectUri,
        scopes: opts.scopes,
        website: opts.website
      });

      io.print('Application registered successfully!');
      io.print('Save these credentials for authentication:');
      io.print(`Client ID: ${credentials.clientId}`);
      io.print(`Client secret: ${credentials.clientSecret}`);
    });

  program
    .command('login')
    .description('Authenticate with a Mastodon instance')
    .option('-i, --instance <url>', 'Mastodon instance (defaults to the configured one)')
    .requiredOption('--client-id <id>', 'Client ID from register-app')
    .requiredOption('--client-secret <secret>', 'Client secret from register-app')
    .option('-r, --redirect-uri <uri>', 'OAuth redirect URI', OOB_REDIRECT_URI)
    .option('-s, --scopes <scopes>', 'OAuth scopes', DEFAULT_SCOPES)
    .action(async (opts: LoginOptions) => {
      const config = await loadConfig();
      const client = new MastodonClient(opts.instance ?? config.instance);
      const credentials = { clientId: opts.clientId, clientSecret: opts.clientSecret };
      const redirectUri = opts.redirectUri ?? OOB_REDIRECT_URI;

      io.print('Please open this URL in your browser to authorize the application:');
      io.print(client.buildAuthorizeUrl(credentials.clientId, redirectUri, opts.scopes));

      const code = (await io.prompt('\nAfter authorizing, paste the authorization code here: ')).trim();
      if (!code) {
        throw new Error('No authorization code entered');
      }

      const token = await client.exchangeAuthorizationCode(credentials, code, redirectUri);
      await new TokenStore(config.tokenFile).save({
        base: client.getBaseUrl(),
        client_id: credentials.clientId,
        client_secret: credentials.clientSecret,
        token
      });
      io.print('Login successful!');
    });

  program
    .command('post')
    .description('Post a status to Mastodon')
    .requiredOption('-s, --status <text>', 'Status text')
    .addOption(new Option('--visibility <visibility>', 'Status visibility').choices(STATUS_VISIBILITIES))
    .option('--sensitive', 'Mark the status as sensitive')
    .option('--spoiler-text <text>', 'Content warning')
    .option('--language <code>', 'ISO 639 language code')
    .option('--in-reply-to-id <id>', 'Status to reply to')
    .action(async (opts: PostOptions) => {
      const client = await authenticatedClient(await loadConfig());
      const statusOptions: StatusOptions = {
        visibility: opts.visibility,
        sensitive: opts.sensitive,
        spoilerText: opts.spoilerText,
        language: opts.language,
        inReplyToId: opts.inReplyToId
      };

      const posted = await client.postStatus(opts.status, statusOptions);
      io.print('Status posted successfully!');
      io.print(`ID: ${posted.id}`);
      if (posted.url) {
        io.print(`URL: ${posted.url}`);
      }
    });

  program
    .command('upcoming')
    .description('Print the upcoming events of the configured feed')
    .option('-l, --limit <n>', 'Maximum number of events', parseLimit)
    .option('--at <timestamp>', 'Reference time as YYYYMMDDTHHMMSSZ (defaults to now)')
    .action(async (opts: UpcomingOptions) => {
      const config = await loadConfig();
      const manager = CalendarManager.fromConfig(config);
      const { events } = await manager.getUpcomingEvents({
        reference: opts.at ? parseReferenceTime(opts.at, config.floatingTimeZone) : undefined,
        limit: opts.limit
      });

      if (events.length === 0) {
        io.print(config.emptyMessage);
        return;
      }
      for (const event of events) {
        io.print(formatEventEntry(event, config));
      }
    });

  program
    .command('announce')
    .description('Post the upcoming events of the configured feed')
    .option('-l, --limit <n>', 'Maximum number of events', parseLimit)
    .option('--at <timestamp>', 'Reference time as YYYYMMDDTHHMMSSZ (defaults to now)')
    .option('--dry-run', 'Print the status without posting it')
    .action(async (opts: AnnounceOptions) => {
      const config = await loadConfig();
      const manager = CalendarManager.fromConfig(config);
      const query = {
        reference: opts.at ? parseReferenceTime(opts.at, config.floatingTimeZone) : undefined,
        limit: opts.limit
      };

      if (opts.dryRun) {
        const { text } = await manager.composeAnnouncement(query);
        io.print(text);
        return;
      }

      const result = await manager.announce(await authenticatedClient(config), query);
      io.print(result.text);
      if (result.posted) {
        io.print(`Posted: ${result.posted.url ?? result.posted.id}`);
      }
    });

  program
    .command('serve')
    .description('Serve the upcoming-events tools over MCP stdio')
    .action(async () => {
      const { config } = program.opts<GlobalOptions>();
      await startServer(config);
    });

  return program;
}

async function authenticatedClient(config: { tokenFile: string }): Promise<MastodonClient> {
  const token = await new TokenStore(config.tokenFile).load();
  return new MastodonClient(token.base, token.token);
}
