import { Command } from 'commander';
import * as out from '../output.js';
import { $try, wantsJson, type OpenDatabase } from '../helpers.js';

export function createTaskCommand(open: OpenDatabase): Command {
  return new Command('task')
    .description('Show one task with its tags and checklist')
    .argument('<uuid>', 'Task uuid')
    .action((uuid: string, _opts: unknown, cmd: Command) => $try(() => {
      const things = open(cmd);
      const task = things.getTaskByUuid(uuid);
      const tags = task.tags ? things.getTagsOfTask(uuid) : [];
      const checklist = task.checklist ? things.getChecklistItems(uuid) : [];

      if (wantsJson(cmd)) {
        out.printJson({ ...task, tag_titles: tags, checklist_items: checklist });
        return;
      }
      out.printTaskDetails(task, tags, checklist);
    }));
}
