import type { AppConfig } from '../../config';
import { authorizeDrive } from '../../utils/driveAuth';
import { createDriveStorageTarget } from './driveStorage';
import { createFirebaseStorageTarget } from './firebaseStorage';
import type { StorageTarget } from './types';

export type { StorageTarget } from './types';

/**
 * Builds the configured upload target, or undefined when uploads are off.
 * Drive authorization happens here, before any theme is processed.
 */
export async function createStorageTarget(
    config: Pick<AppConfig, 'upload'>,
    askForCode: (authUrl: string) => Promise<string>
): Promise<StorageTarget | undefined> {
    const upload = config.upload;
    switch (upload.provider) {
        case 'none':
            return undefined;
        case 'drive': {
            const auth = await authorizeDrive({
                credentialsPath: upload.credentialsPath,
                tokenPath: upload.tokenPath,
                askForCode
            });
            return createDriveStorageTarget(auth, upload.parentFolderId);
        }
        case 'firebase':
            return createFirebaseStorageTarget(upload.bucket, upload.parentPrefix);
    }
}
