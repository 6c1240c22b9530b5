export type { Activity, ActivityRecord, ActivityCatalog } from './activity.js';
export {
  toActivityRecord,
  fromActivityRecord,
  cloneActivity,
  isValidMaxParticipants,
  validateActivityRecord,
  parseActivityCatalog,
} from './activity.js';
