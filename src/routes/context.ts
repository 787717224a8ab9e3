import type { AppConfig, ManagedConverter } from '../types';
import type { BatchRunner } from '../batch';

/**
 * Dependencies handed to every route plugin at registration
 */
export interface RouteContext {
  config: AppConfig;
  converter: ManagedConverter;
  runner: BatchRunner;
}
