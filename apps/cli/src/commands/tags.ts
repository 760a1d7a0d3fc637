import { Command } from 'commander';
import chalk from 'chalk';
import * as out from '../output.js';
import { $try, wantsJson, type OpenDatabase } from '../helpers.js';

type TagsOptions = {
  title?: string;
  area?: string;
  task?: string;
};

export function createTagsCommand(open: OpenDatabase): Command {
  return new Command('tags')
    .description('List tags, or the tags on one task or area')
    .option('--title <title>', 'Only the tag with this title')
    .option('--area <uuid>', 'Tags on this area')
    .option('--task <uuid>', 'Tags on this task')
    .action((_opts: unknown, cmd: Command) => $try(() => {
      const o = cmd.opts<TagsOptions>();
      const things = open(cmd);

      if (o.area !== undefined || o.task !== undefined) {
        const titles = o.task !== undefined ? things.getTagsOfTask(o.task) : things.getTagsOfArea(o.area ?? '');
        if (wantsJson(cmd)) out.printJson(titles);
        else if (titles.length === 0) out.info('No tags');
        else console.log(titles.map(t => chalk.cyan(`#${t}`)).join(' '));
        return;
      }

      const tags = things.getTags({ title: o.title });
      if (wantsJson(cmd)) {
        out.printJson(tags);
      } else if (tags.length === 0) {
        out.info('No tags found');
      } else {
        for (const tag of tags) console.log(out.formatTag(tag));
      }
    }));
}
