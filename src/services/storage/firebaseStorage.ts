import * as admin from 'firebase-admin';
import path from 'node:path';
import { StorageError } from '../../../shared/errors';
import { sanitizeForFilename } from '../../../shared/utils/filenames';
import type { StorageTarget } from './types';

/** The bucket operations the uploader needs. */
export interface BucketOperations {
    hasObjects(prefix: string): Promise<boolean>;
    createMarker(objectPath: string): Promise<void>;
    upload(localPath: string, destination: string): Promise<void>;
}

/**
 * Cloud Storage has no folders: a "folder" is an object prefix under
 * `parentPrefix`, made visible with a zero-byte `<prefix>/` marker.
 */
export class FirebaseStorageTarget implements StorageTarget {
    readonly name = 'firebase';

    constructor(
        private readonly bucket: BucketOperations,
        private readonly parentPrefix: string
    ) { }

    async ensureFolder(folderName: string): Promise<string> {
        const folder = [this.parentPrefix, sanitizeForFilename(folderName)].filter(Boolean).join('/') + '/';

        let exists: boolean;
        try {
            exists = await this.bucket.hasObjects(folder);
        } catch (error: unknown) {
            throw new StorageError(`Failed to look up storage folder '${folder}'`, 'FIND_FOLDER', error);
        }
        if (exists) return folder;

        try {
            await this.bucket.createMarker(folder);
            console.log(`[STORAGE] Created storage folder '${folder}'`);
            return folder;
        } catch (error: unknown) {
            throw new StorageError(`Failed to create storage folder '${folder}'`, 'CREATE_FOLDER', error);
        }
    }

    async upload(folderId: string, localPath: string): Promise<string> {
        const destination = `${folderId}${path.basename(localPath)}`;
        try {
            await this.bucket.upload(localPath, destination);
            return destination;
        } catch (error: unknown) {
            throw new StorageError(`Failed to upload ${localPath} to ${destination}`, 'UPLOAD', error);
        }
    }
}

/**
 * Uses application default credentials (GOOGLE_APPLICATION_CREDENTIALS).
 */
export function createFirebaseStorageTarget(bucketName: string, parentPrefix: string): FirebaseStorageTarget {
    const app = admin.initializeApp({ storageBucket: bucketName }, 'slide-uploads');
    const bucket = admin.storage(app).bucket();

    return new FirebaseStorageTarget({
        async hasObjects(prefix) {
            const [files] = await bucket.getFiles({ prefix, maxResults: 1 });
            return files.length > 0;
        },
        async createMarker(objectPath) {
            await bucket.file(objectPath).save('');
        },
        async upload(localPath, destination) {
            await bucket.upload(localPath, { destination, metadata: { contentType: 'image/png' } });
        }
    }, parentPrefix);
}
