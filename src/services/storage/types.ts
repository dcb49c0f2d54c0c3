/**
 * Cloud destination for generated images, one folder per theme.
 */
export interface StorageTarget {
    readonly name: string;
    /** Returns the id of the folder called `folderName`, creating it when absent. */
    ensureFolder(folderName: string): Promise<string>;
    /** Uploads one local file into the folder and returns the remote id/path. */
    upload(folderId: string, localPath: string): Promise<string>;
}
