export { TargetsStore, DEFAULT_TARGETS_FILE } from './store.js';
export {
    DEFAULT_TEAM_TARGETS,
    TeamTargetsSchema,
    TeamTargetsUpdateSchema,
    TargetsFileSchema,
} from './schemas.js';
export type { TeamTargets, TeamTargetsUpdate, TargetsFile } from './schemas.js';
export { TargetsError } from './errors.js';
export { TargetsErrorCode } from './error-codes.js';
