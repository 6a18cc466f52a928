export {
  runPrecommitGate,
  installPrecommitHook,
  isManagedHook,
  HOOK_MARKER,
  PRE_COMMIT_HOOK_TEMPLATE,
} from './precommit.js';
export type { CheckRunner, InstallHookOptions, InstallHookResult } from './precommit.js';
