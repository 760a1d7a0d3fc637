import { Command } from 'commander';
import * as out from '../output.js';
import { $try, wantsJson, type OpenDatabase } from '../helpers.js';

export function createChecklistCommand(open: OpenDatabase): Command {
  return new Command('checklist')
    .description('Show the checklist of a to-do')
    .argument('<taskUuid>', 'Task uuid')
    .action((taskUuid: string, _opts: unknown, cmd: Command) => $try(() => {
      const items = open(cmd).getChecklistItems(taskUuid);
      if (wantsJson(cmd)) {
        out.printJson(items);
      } else if (items.length === 0) {
        out.info('No checklist items');
      } else {
        for (const item of items) console.log(out.formatChecklistItem(item));
      }
    }));
}
