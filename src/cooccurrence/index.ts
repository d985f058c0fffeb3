export { ElementCooccurrence } from "./ElementCooccurrence.js";
export type { CooccurrenceState, JointCell } from "./ElementCooccurrence.js";
export { elementKey } from "./elementKey.js";
export { InvalidArgumentError, checkArgument } from "./errors.js";
export {
  compareLift,
  createLift,
  createMutualInformation,
  formatLift,
  liftEquals,
  mutualInformationEquals,
} from "./records.js";
export type { CooccurrenceOptions, ElementCount, KeyFn, Lift, MutualInformation } from "./types.js";
