import type { SimLogEntry } from '../types.js';
import { EventBus } from './eventBus.js';

/**
 * Global stream of simulation log entries.
 *
 * The world emits to this bus through the logger; the logger and the terminal UI subscribe.
 */
export const eventBus = new EventBus<SimLogEntry>();
