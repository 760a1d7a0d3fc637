import { Command } from 'commander';
import type { RelationFilter } from '@thingsql/core';
import * as out from '../output.js';
import { $try, wantsJson, parseFlagOrValue, type OpenDatabase } from '../helpers.js';

type AreasOptions = {
  uuid?: string;
  tag?: RelationFilter;
  count?: boolean;
};

export function createAreasCommand(open: OpenDatabase): Command {
  return new Command('areas')
    .description('List areas')
    .option('--uuid <uuid>', 'Only this area')
    .option('--tag <title>', 'Tag title, or true/false for any/none', parseFlagOrValue)
    .option('-c, --count', 'Print the number of matches only')
    .action((_opts: unknown, cmd: Command) => $try(() => {
      const { count, ...filters } = cmd.opts<AreasOptions>();
      const things = open(cmd);

      if (count) {
        const n = things.countAreas(filters);
        if (wantsJson(cmd)) out.printJson({ count: n });
        else out.info(String(n));
        return;
      }

      const areas = things.getAreas(filters);
      if (wantsJson(cmd)) {
        out.printJson(areas);
      } else if (areas.length === 0) {
        out.info('No areas found');
      } else {
        for (const area of areas) console.log(out.formatArea(area));
      }
    }));
}
