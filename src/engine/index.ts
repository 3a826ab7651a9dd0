export {
  VersionEngine,
  type VersionEngineOptions,
  type RunOptions,
  type RunResult,
} from './version-engine.ts';
