import { z } from 'zod';

export const DriveItemSchema = z
  .object({
    id: z.string(),
    name: z.string().default(''),
    size: z.number().optional(),
    webUrl: z.string().optional(),
    createdDateTime: z.string().optional(),
    lastModifiedDateTime: z.string().optional(),
    folder: z.object({ childCount: z.number().optional() }).passthrough().optional(),
    file: z.object({ mimeType: z.string().optional() }).passthrough().optional(),
    parentReference: z
      .object({
        driveId: z.string().optional(),
        id: z.string().optional(),
        path: z.string().optional(),
      })
      .passthrough()
      .optional(),
    '@microsoft.graph.downloadUrl': z.string().optional(),
  })
  .passthrough();

export type DriveItem = z.infer<typeof DriveItemSchema>;

export const DriveItemCollectionSchema = z.object({
  value: z.array(DriveItemSchema),
  '@odata.nextLink': z.string().optional(),
});

export const DriveSchema = z
  .object({
    id: z.string(),
    driveType: z.string().optional(),
    name: z.string().optional(),
    quota: z
      .object({
        total: z.number().optional(),
        used: z.number().optional(),
        remaining: z.number().optional(),
        deleted: z.number().optional(),
        state: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type Drive = z.infer<typeof DriveSchema>;

export const ThumbnailSetCollectionSchema = z.object({
  value: z.array(
    z
      .object({
        id: z.string().optional(),
        small: z.object({ url: z.string() }).passthrough().optional(),
        medium: z.object({ url: z.string() }).passthrough().optional(),
        large: z.object({ url: z.string() }).passthrough().optional(),
      })
      .passthrough(),
  ),
});

export type ThumbnailSet = z.infer<typeof ThumbnailSetCollectionSchema>['value'][number];

/**
 * Flattened view of a drive item returned by the tools.
 */
export interface DriveItemSummary {
  id: string;
  name: string;
  type: 'file' | 'folder';
  size?: number;
  mimeType?: string;
  childCount?: number;
  webUrl?: string;
  parentId?: string;
  parentPath?: string;
  createdDateTime?: string;
  lastModifiedDateTime?: string;
}

export function summarizeItem(item: DriveItem): DriveItemSummary {
  return {
    id: item.id,
    name: item.name,
    type: item.folder ? 'folder' : 'file',
    size: item.size,
    mimeType: item.file?.mimeType,
    childCount: item.folder?.childCount,
    webUrl: item.webUrl,
    parentId: item.parentReference?.id,
    parentPath: item.parentReference?.path,
    createdDateTime: item.createdDateTime,
    lastModifiedDateTime: item.lastModifiedDateTime,
  };
}
