/**
 * Scene Import System
 *
 * Host-facing entry point for the importer. The host activates the system
 * when the editor starts and deactivates it on shutdown; imports are only
 * accepted while active.
 */

import { ERROR_MESSAGES } from '../constants/errors';
import { SceneGraphErrorFactory } from '../errors';
import { Logger, LoggerFactory } from '../utils/logger';
import { EntityApi } from './entity-api';
import { importScene, SceneImportOptions, SceneImportResult } from './scene-importer';

export class SceneImportSystem<THandle> {
  private active = false;
  private readonly logger: Logger;

  constructor(
    private readonly entityApi: EntityApi<THandle>,
    private readonly defaults: Omit<SceneImportOptions, 'signal'> = {}
  ) {
    this.logger = defaults.logger ?? LoggerFactory.forImport();
  }

  activate(): void {
    if (this.active) return;
    this.active = true;
    this.logger.debug('Scene import system activated');
  }

  deactivate(): void {
    if (!this.active) return;
    this.active = false;
    this.logger.debug('Scene import system deactivated');
  }

  isActive(): boolean {
    return this.active;
  }

  importScene(sceneRoot: string, sceneName: string, options: SceneImportOptions = {}): SceneImportResult {
    if (!this.active) {
      throw SceneGraphErrorFactory.importError(ERROR_MESSAGES.SYSTEM_INACTIVE, 'activation', { sceneName });
    }
    return importScene(sceneRoot, sceneName, this.entityApi, {
      ...this.defaults,
      logger: this.logger,
      ...options,
    });
  }
}
