/**
 * Bot Queue Module
 * In-process channels and detached-work tracking
 */

export { AsyncQueue } from './asyncQueue';
export { UpdateQueue, type UpdateHandler } from './updateQueue';
export { TaskTracker } from './taskTracker';
