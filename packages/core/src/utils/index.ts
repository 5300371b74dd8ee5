export { getPulseboardHome, getPulseboardPath, getGlobalEnvPath } from './path.js';
