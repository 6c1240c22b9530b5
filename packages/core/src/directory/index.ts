export {
  ActivityDirectory,
  createActivityDirectory,
  SignupStatus,
  ALREADY_REGISTERED_MESSAGE,
  type SignupResult,
  type RemovalResult,
} from './activity-directory.js';
export { DEFAULT_ACTIVITIES } from './seed.js';
