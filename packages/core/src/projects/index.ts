export { resolveProjectPath } from './project-resolver.js';
