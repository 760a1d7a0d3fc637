import { Command } from 'commander';
import { TASK_TYPES, TASK_STATUSES, START_BUCKETS } from '@thingsql/core';
import type { TaskFilters, TaskType, TaskStatus, StartBucket } from '@thingsql/core';
import * as out from '../output.js';
import {
  $try, wantsJson, parseChoice, parseFlagOrValue, parseTriState, type OpenDatabase,
} from '../helpers.js';

type TasksOptions = {
  type?: TaskType;
  status?: TaskStatus;
  start?: StartBucket;
  area?: string | boolean;
  project?: string | boolean;
  heading?: string | boolean;
  tag?: string | boolean;
  startDate?: string | boolean;
  stopDate?: string | boolean;
  exact?: boolean;
  deadline?: string | boolean;
  deadlineSuppressed?: boolean | null;
  trashed?: boolean | null;
  contextTrashed?: boolean | null;
  last?: string;
  search?: string;
  today?: boolean;
  count?: boolean;
};

export function toTaskFilters(o: TasksOptions): TaskFilters {
  return {
    type: o.type,
    status: o.status,
    start: o.start,
    area: o.area,
    project: o.project,
    heading: o.heading,
    tag: o.tag,
    startDate: o.startDate,
    stopDate: o.stopDate,
    exact: o.exact,
    deadline: o.deadline,
    deadlineSuppressed: o.deadlineSuppressed ?? undefined,
    trashed: o.trashed,
    contextTrashed: o.contextTrashed,
    last: o.last,
    searchQuery: o.search,
    index: o.today ? 'todayIndex' : 'index',
  };
}

export function createTasksCommand(open: OpenDatabase): Command {
  return new Command('tasks')
    .description('List tasks, projects and headings')
    .option('--type <type>', `Item type (${TASK_TYPES.join(', ')})`, parseChoice(TASK_TYPES))
    .option('--status <status>', `Status (${TASK_STATUSES.join(', ')})`, parseChoice(TASK_STATUSES))
    .option('--start <bucket>', `Start bucket (${START_BUCKETS.join(', ')})`, parseChoice(START_BUCKETS))
    .option('--area <uuid>', 'Area uuid, or true/false for any/none', parseFlagOrValue)
    .option('--project <uuid>', 'Project uuid, or true/false for any/none', parseFlagOrValue)
    .option('--heading <uuid>', 'Heading uuid, or true/false for any/none', parseFlagOrValue)
    .option('--tag <title>', 'Tag title, or true/false for any/none', parseFlagOrValue)
    .option('--start-date <date>', 'yyyy-MM-dd (on or after), future, past, true or false', parseFlagOrValue)
    .option('--stop-date <date>', 'yyyy-MM-dd (on or after), future, past, true or false', parseFlagOrValue)
    .option('--exact', 'Match --stop-date on that day only')
    .option('--deadline <date>', 'yyyy-MM-dd (on or after), future, past, true or false', parseFlagOrValue)
    .option('--deadline-suppressed <value>', 'Deadline dismissed: true, false or any', parseTriState)
    .option('--trashed <value>', 'true, false (default) or any', parseTriState)
    .option('--context-trashed <value>', 'Project trashed: true, false (default) or any', parseTriState)
    .option('--last <offset>', 'Created within the last N days/weeks/years, e.g. 3d, 2w, 1y')
    .option('-s, --search <query>', 'Search titles, notes and area titles')
    .option('--today', 'Order as in the Today list')
    .option('-c, --count', 'Print the number of matches only')
    .action((_opts: unknown, cmd: Command) => $try(() => {
      const o = cmd.opts<TasksOptions>();
      const things = open(cmd);
      const filters = toTaskFilters(o);

      if (o.count) {
        const count = things.countTasks(filters);
        if (wantsJson(cmd)) out.printJson({ count });
        else out.info(String(count));
        return;
      }

      const tasks = things.getTasks(filters);
      if (wantsJson(cmd)) out.printJson(tasks);
      else out.printTasks(tasks);
    }));
}
