import type { BaseDriveTool } from './base-drive-tool.js';
import { BulkDelete } from './bulk-delete/index.js';
import { BulkMove } from './bulk-move/index.js';
import { CopyLargeFile } from './copy-large-file/index.js';
import { CreateFolder } from './create-folder/index.js';
import { DeleteFile } from './delete-file/index.js';
import { DownloadFile } from './download-file/index.js';
import { FindFilesByField } from './find-files-by-field/index.js';
import { GetFileInfo } from './get-file-info/index.js';
import { GetStorageUsage } from './get-storage-usage/index.js';
import { GetThumbnails } from './get-thumbnails/index.js';
import { ListFiles } from './list-files/index.js';
import { MoveFile } from './move-file/index.js';
import { MoveLargeFile } from './move-large-file/index.js';
import { OrganizeFiles } from './organize-files/index.js';
import { PollCopyStatus } from './poll-copy-status/index.js';
import { ReadFileContent } from './read-file-content/index.js';
import { RenameItem } from './rename-item/index.js';
import { SearchFiles } from './search-files/index.js';
import { UploadFile } from './upload-file/index.js';

export {
  BulkDelete,
  BulkMove,
  CopyLargeFile,
  CreateFolder,
  DeleteFile,
  DownloadFile,
  FindFilesByField,
  GetFileInfo,
  GetStorageUsage,
  GetThumbnails,
  ListFiles,
  MoveFile,
  MoveLargeFile,
  OrganizeFiles,
  PollCopyStatus,
  ReadFileContent,
  RenameItem,
  SearchFiles,
  UploadFile,
};

export function createDriveTools(): BaseDriveTool[] {
  return [
    new ListFiles(),
    new CreateFolder(),
    new DeleteFile(),
    new RenameItem(),
    new MoveFile(),
    new GetFileInfo(),
    new DownloadFile(),
    new UploadFile(),
    new GetThumbnails(),
    new ReadFileContent(),
    new SearchFiles(),
    new FindFilesByField(),
    new GetStorageUsage(),
    new MoveLargeFile(),
    new CopyLargeFile(),
    new PollCopyStatus(),
    new BulkDelete(),
    new BulkMove(),
    new OrganizeFiles(),
  ];
}
