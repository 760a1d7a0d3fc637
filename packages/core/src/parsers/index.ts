export {
  encodeThingsDate,
  decodeThingsDate,
  isIsoDate,
  isoDateToThingsDateSql,
  thingsDateToIsoDateSql,
  todayAsThingsDateSql,
  MAX_YEAR,
} from './things-date.js';
export { parseOffset, offsetToModifier } from './offset-parser.js';
export type { Offset, OffsetUnit } from './offset-parser.js';
