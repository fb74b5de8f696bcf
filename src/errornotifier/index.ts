export { LogNotifier } from './notifier.js';
export type { Notifier } from './notifier.js';
export { BufferNotifier, TestNotifier } from './test-notifiers.js';
export type { Notice } from './test-notifiers.js';
