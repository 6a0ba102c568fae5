export {
  DEFAULT_SERVER_URL,
  createTriggerContext,
  eventKindFromName,
  parseGitRef,
} from "./trigger-context.js";
export { triggerInputFromActions } from "./actions-context.js";
export { triggerInputFromGit, parseRemoteUrl } from "./git-context.js";
export type {
  EventKind,
  RefKind,
  TriggerContext,
  TriggerInput,
} from "./types.js";
export type { ActionsContextLike } from "./actions-context.js";
