import {CommandDispatcher} from '../commandDispatcher.js';
import ReadThroughCache from '../readThroughCache.js';

/**
 * What every sensor and control needs to know about the canvas it belongs to. Holds references to
 * the shared cache and dispatcher, never a copy of device state.
 */
export type DeviceContext = {
  readonly host: string;
  readonly displayName: string;
  readonly cache: ReadThroughCache;
  readonly dispatcher: CommandDispatcher;
};
