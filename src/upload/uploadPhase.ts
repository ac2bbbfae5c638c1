import type { Config } from '../shared/config.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { resolvePath } from '../shared/utils.js';
import { DriveClient, loadServiceAccount, parseDriveFolderId, type RemoteStore } from './driveClient.js';
import { TreeUploader, type UploadSummary } from './uploader.js';

export type UploadPhaseResult =
  | { status: 'disabled' }
  | { status: 'skipped'; reason: string }
  | { status: 'completed'; folderId: string; summary: UploadSummary; succeeded: number; failed: number };

export function createDriveClient(config: Config['upload']): DriveClient {
  if (config.access_token) {
    return new DriveClient({ accessToken: config.access_token });
  }
  return new DriveClient({ serviceAccount: loadServiceAccount(resolvePath(config.credentials_path)) });
}

/**
 * Upload the output tree when enabled. Configuration and credential problems
 * skip the upload and are reported; they never undo the harvest.
 */
export async function runUploadPhase(
  config: Config,
  outputRoot: string,
  remote?: RemoteStore,
): Promise<UploadPhaseResult> {
  if (!config.upload.enabled) {
    logger.info('Drive upload disabled (set ENABLE_DRIVE_UPLOAD=true to enable)');
    return { status: 'disabled' };
  }
  if (!config.upload.drive_folder_url) {
    logger.warn('Drive upload enabled but DRIVE_FOLDER_URL not set');
    return { status: 'skipped', reason: 'DRIVE_FOLDER_URL not set' };
  }

  const folderId = parseDriveFolderId(config.upload.drive_folder_url);
  let store: RemoteStore;
  try {
    store = remote ?? createDriveClient(config.upload);
  } catch (err) {
    logger.error({ error: errorMessage(err) }, 'Drive upload skipped');
    return { status: 'skipped', reason: errorMessage(err) };
  }

  logger.info({ folderId }, 'Starting Drive upload');
  let summary: UploadSummary;
  try {
    summary = await new TreeUploader(store).uploadAll(outputRoot, folderId);
  } catch (err) {
    logger.error({ error: errorMessage(err) }, 'Drive upload skipped');
    return { status: 'skipped', reason: errorMessage(err) };
  }

  const categories = Object.values(summary);
  const succeeded = categories.filter((c) => c.failed === 0).length;
  const failed = categories.length - succeeded;
  logger.info({ succeeded, failed }, 'Drive upload complete');

  return { status: 'completed', folderId, summary, succeeded, failed };
}
