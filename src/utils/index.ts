export { createModuleLogger, describeError } from './logger';
