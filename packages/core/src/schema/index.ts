export { tasks } from './tasks.js';
export { areas } from './areas.js';
export { tags, taskTags, areaTags } from './tags.js';
export { checklistItems } from './checklist-items.js';
export { meta, settings } from './meta.js';
