import { Command } from 'commander';
import * as out from '../output.js';
import { $try, wantsJson, type OpenDatabase } from '../helpers.js';

export function createVersionCommand(open: OpenDatabase): Command {
  return new Command('version')
    .description('Show the database schema version')
    .action((_opts: unknown, cmd: Command) => $try(() => {
      const things = open(cmd);
      const version = things.getVersion();
      if (wantsJson(cmd)) out.printJson({ version, filepath: things.filepath });
      else out.info(`Schema version ${version} (${things.filepath})`);
    }));
}

export function createTokenCommand(open: OpenDatabase): Command {
  return new Command('token')
    .description('Show the URL scheme authentication token')
    .action((_opts: unknown, cmd: Command) => $try(() => {
      const token = open(cmd).getUrlSchemeAuthToken();
      if (wantsJson(cmd)) {
        out.printJson({ token });
      } else if (token === null) {
        out.warning('No URL scheme token set; enable Things URLs in the app settings');
      } else {
        out.info(token);
      }
    }));
}
