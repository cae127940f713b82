export { log } from './log';
export { safeEditMessage, safeDeleteMessage, StatusMessage } from './message';
