import { createReadStream } from 'node:fs';
import path from 'node:path';
import { google, type Auth, type drive_v3 } from 'googleapis';
import { StorageError } from '../../../shared/errors';
import type { StorageTarget } from './types';

const FOLDER_MIME_TYPE = 'application/vnd.google-apps.folder';

/** The two Drive `files` calls the uploader makes. */
export interface DriveFilesClient {
    list(params: drive_v3.Params$Resource$Files$List): Promise<{ data: drive_v3.Schema$FileList }>;
    create(params: drive_v3.Params$Resource$Files$Create): Promise<{ data: drive_v3.Schema$File }>;
}

export function escapeDriveQueryValue(value: string): string {
    return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

export class DriveStorageTarget implements StorageTarget {
    readonly name = 'drive';

    constructor(
        private readonly files: DriveFilesClient,
        private readonly parentFolderId: string
    ) { }

    async ensureFolder(folderName: string): Promise<string> {
        const query = [
            `mimeType='${FOLDER_MIME_TYPE}'`,
            `name='${escapeDriveQueryValue(folderName)}'`,
            `'${escapeDriveQueryValue(this.parentFolderId)}' in parents`,
            'trashed=false'
        ].join(' and ');

        let existing: drive_v3.Schema$File[];
        try {
            const res = await this.files.list({ q: query, fields: 'files(id, name)', spaces: 'drive', pageSize: 10 });
            existing = res.data.files ?? [];
        } catch (error: unknown) {
            throw new StorageError(`Failed to look up Drive folder '${folderName}'`, 'FIND_FOLDER', error);
        }

        // Name collisions: reuse the first match
        const found = existing.find(file => file.id);
        if (found?.id) {
            console.log(`[STORAGE] Using existing Drive folder '${folderName}' (${found.id})`);
            return found.id;
        }

        try {
            const res = await this.files.create({
                requestBody: { name: folderName, mimeType: FOLDER_MIME_TYPE, parents: [this.parentFolderId] },
                fields: 'id'
            });
            if (!res.data.id) {
                throw new Error('Drive returned no folder id');
            }
            console.log(`[STORAGE] Created Drive folder '${folderName}' (${res.data.id})`);
            return res.data.id;
        } catch (error: unknown) {
            throw new StorageError(`Failed to create Drive folder '${folderName}'`, 'CREATE_FOLDER', error);
        }
    }

    async upload(folderId: string, localPath: string): Promise<string> {
        try {
            const res = await this.files.create({
                requestBody: { name: path.basename(localPath), parents: [folderId] },
                media: { mimeType: 'image/png', body: createReadStream(localPath) },
                fields: 'id'
            });
            if (!res.data.id) {
                throw new Error('Drive returned no file id');
            }
            return res.data.id;
        } catch (error: unknown) {
            throw new StorageError(`Failed to upload ${localPath} to Drive`, 'UPLOAD', error);
        }
    }
}

export function createDriveStorageTarget(auth: Auth.OAuth2Client, parentFolderId: string): DriveStorageTarget {
    const drive = google.drive({ version: 'v3', auth });
    return new DriveStorageTarget({
        list: params => drive.files.list(params),
        create: params => drive.files.create(params)
    }, parentFolderId);
}
