import { z } from 'zod';
import { logEvent } from '@drivebridge/core';
import type { RemoteClient, RemoteResponse } from '../client/remote-client.js';
import { RemoteError } from '../errors/remote-error.js';
import {
  type Drive,
  type DriveItem,
  DriveItemCollectionSchema,
  DriveItemSchema,
  DriveSchema,
  type ThumbnailSet,
  ThumbnailSetCollectionSchema,
} from './drive-item.js';

/** Largest payload accepted by a single-request upload */
export const SIMPLE_UPLOAD_LIMIT_BYTES = 4 * 1024 * 1024;

export type ConflictBehavior = 'rename' | 'replace' | 'fail';

/**
 * Which drive an operation targets. `driveId` wins over `userId`; with
 * neither, the service falls back to its configured defaults and finally to
 * the first user of the tenant.
 */
export interface DriveAddress {
  driveId?: string;
  userId?: string;
}

export interface DriveServiceDefaults {
  driveId?: string;
  userId?: string;
}

export interface DownloadLink {
  id: string;
  name: string;
  size?: number;
  downloadUrl: string;
}

const UserCollectionSchema = z.object({
  value: z.array(z.object({ id: z.string() }).passthrough()),
});

function parseBody<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  response: RemoteResponse,
  what: string,
): T {
  const parsed = schema.safeParse(response.data);
  if (!parsed.success) {
    throw RemoteError.invalidResponse(
      `unexpected ${what} payload`,
      response.status,
      response.requestId,
    );
  }
  return parsed.data;
}

/**
 * Encodes a slash-separated drive path segment by segment.
 */
export function encodeDrivePath(path: string): string {
  return path
    .split('/')
    .filter((segment) => segment.length > 0)
    .map((segment) => encodeURIComponent(segment))
    .join('/');
}

const seg = encodeURIComponent;

/**
 * Single-item drive operations: one remote call each (plus drive
 * resolution when no drive is named).
 */
export class DriveService {
  public constructor(
    private readonly client: RemoteClient,
    private readonly defaults: DriveServiceDefaults = {},
  ) {}

  /**
   * Replaces an empty address with a concrete one so that repeated calls
   * for the same request resolve the fallback drive only once.
   */
  public async pinAddress(address: DriveAddress = {}): Promise<DriveAddress> {
    if (address.driveId || address.userId) {
      return address;
    }
    if (this.defaults.driveId || this.defaults.userId) {
      return { driveId: this.defaults.driveId, userId: this.defaults.userId };
    }

    const response = await this.client.call('GET', '/users', {
      query: { $top: 1, $select: 'id' },
    });
    const users = parseBody(UserCollectionSchema, response, 'user list');
    const first = users.value[0];
    if (!first) {
      throw new RemoteError({
        code: 'noUsersFound',
        httpStatus: 404,
        message: 'No users found in the tenant to resolve a default drive',
        requestId: response.requestId,
      });
    }
    logEvent('debug', 'drive:resolved_first_user', { userId: first.id });
    return { userId: first.id };
  }

  /**
   * Base path of the addressed drive: `/drives/{id}` or `/users/{id}/drive`.
   */
  public async resolveDrivePath(address: DriveAddress = {}): Promise<string> {
    const pinned = await this.pinAddress(address);
    if (pinned.driveId) {
      return `/drives/${seg(pinned.driveId)}`;
    }
    return `/users/${seg(pinned.userId ?? '')}/drive`;
  }

  public async listChildren(
    address: DriveAddress,
    location: { folderId?: string; folderPath?: string; top?: number } = {},
  ): Promise<DriveItem[]> {
    const base = await this.resolveDrivePath(address);
    const path = location.folderId
      ? `${base}/items/${seg(location.folderId)}/children`
      : location.folderPath && encodeDrivePath(location.folderPath)
        ? `${base}/root:/${encodeDrivePath(location.folderPath)}:/children`
        : `${base}/root/children`;

    const response = await this.client.call('GET', path, {
      query: { $top: location.top },
    });
    return parseBody(DriveItemCollectionSchema, response, 'children').value;
  }

  public async getItem(address: DriveAddress, itemId: string): Promise<DriveItem> {
    const base = await this.resolveDrivePath(address);
    const response = await this.client.call('GET', `${base}/items/${seg(itemId)}`);
    return parseBody(DriveItemSchema, response, 'item');
  }

  /**
   * Looks an item up by path; `undefined` when it does not exist.
   */
  public async findItemByPath(
    address: DriveAddress,
    path: string,
  ): Promise<DriveItem | undefined> {
    const base = await this.resolveDrivePath(address);
    const encoded = encodeDrivePath(path);
    try {
      const response = await this.client.call(
        'GET',
        encoded ? `${base}/root:/${encoded}` : `${base}/root`,
      );
      return parseBody(DriveItemSchema, response, 'item');
    } catch (error) {
      if (error instanceof RemoteError && error.httpStatus === 404) {
        return undefined;
      }
      throw error;
    }
  }

  public async createFolder(
    address: DriveAddress,
    name: string,
    parent: { parentId?: string; parentPath?: string } = {},
    conflictBehavior: ConflictBehavior = 'rename',
  ): Promise<DriveItem> {
    const base = await this.resolveDrivePath(address);
    const parentPath = parent.parentPath ? encodeDrivePath(parent.parentPath) : '';
    const path = parent.parentId
      ? `${base}/items/${seg(parent.parentId)}/children`
      : parentPath
        ? `${base}/root:/${parentPath}:/children`
        : `${base}/root/children`;

    const response = await this.client.call('POST', path, {
      body: {
        name,
        folder: {},
        '@microsoft.graph.conflictBehavior': conflictBehavior,
      },
    });
    return parseBody(DriveItemSchema, response, 'folder');
  }

  /**
   * Returns the folder at `path`, creating missing segments from the root.
   */
  public async ensureFolderPath(
    unpinned: DriveAddress,
    path: string,
  ): Promise<DriveItem> {
    const address = await this.pinAddress(unpinned);
    const segments = path.split('/').filter((segment) => segment.length > 0);
    let current = await this.findItemByPath(address, '');
    if (!current) {
      throw RemoteError.invalidResponse('drive root not found', 404);
    }

    for (let index = 0; index < segments.length; index++) {
      const prefix = segments.slice(0, index + 1).join('/');
      const existing = await this.findItemByPath(address, prefix);
      current =
        existing ??
        (await this.createFolder(address, segments[index], { parentId: current.id }, 'fail'));
    }
    return current;
  }

  public async deleteItem(address: DriveAddress, itemId: string): Promise<void> {
    const base = await this.resolveDrivePath(address);
    await this.client.call('DELETE', `${base}/items/${seg(itemId)}`, {
      responseType: 'none',
    });
  }

  public async updateItem(
    address: DriveAddress,
    itemId: string,
    patch: { name?: string; parentId?: string },
  ): Promise<DriveItem> {
    const base = await this.resolveDrivePath(address);
    const body: Record<string, unknown> = {};
    if (patch.name !== undefined) {
      body.name = patch.name;
    }
    if (patch.parentId !== undefined) {
      body.parentReference = { id: patch.parentId };
    }

    const response = await this.client.call('PATCH', `${base}/items/${seg(itemId)}`, {
      body,
    });
    return parseBody(DriveItemSchema, response, 'item');
  }

  public async getDownloadLink(address: DriveAddress, itemId: string): Promise<DownloadLink> {
    const base = await this.resolveDrivePath(address);
    const response = await this.client.call('GET', `${base}/items/${seg(itemId)}`, {
      query: { $select: 'id,name,size,@microsoft.graph.downloadUrl' },
    });
    const item = parseBody(DriveItemSchema, response, 'item');
    const downloadUrl = item['@microsoft.graph.downloadUrl'];
    if (!downloadUrl) {
      throw new RemoteError({
        code: 'notDownloadable',
        httpStatus: response.status,
        message: `Item ${itemId} has no download URL (folders cannot be downloaded)`,
        requestId: response.requestId,
      });
    }
    return { id: item.id, name: item.name, size: item.size, downloadUrl };
  }

  public async uploadContent(
    address: DriveAddress,
    targetPath: string,
    content: Uint8Array,
    options: { contentType?: string; conflictBehavior?: ConflictBehavior } = {},
  ): Promise<DriveItem> {
    const base = await this.resolveDrivePath(address);
    const response = await this.client.call(
      'PUT',
      `${base}/root:/${encodeDrivePath(targetPath)}:/content`,
      {
        body: content,
        contentType: options.contentType ?? 'application/octet-stream',
        query: {
          '@microsoft.graph.conflictBehavior': options.conflictBehavior ?? 'replace',
        },
      },
    );
    return parseBody(DriveItemSchema, response, 'uploaded item');
  }

  public async getThumbnails(address: DriveAddress, itemId: string): Promise<ThumbnailSet[]> {
    const base = await this.resolveDrivePath(address);
    const response = await this.client.call(
      'GET',
      `${base}/items/${seg(itemId)}/thumbnails`,
    );
    return parseBody(ThumbnailSetCollectionSchema, response, 'thumbnails').value;
  }

  public async readText(address: DriveAddress, itemId: string): Promise<string> {
    const base = await this.resolveDrivePath(address);
    const response = await this.client.call(
      'GET',
      `${base}/items/${seg(itemId)}/content`,
      { responseType: 'text' },
    );
    return typeof response.data === 'string' ? response.data : '';
  }

  /**
   * Full-text search below the drive root. Single quotes are doubled as the
   * OData string literal requires.
   */
  public async search(
    address: DriveAddress,
    query: string,
    top?: number,
  ): Promise<DriveItem[]> {
    const base = await this.resolveDrivePath(address);
    const literal = encodeURIComponent(query.replace(/'/g, "''"));
    const response = await this.client.call('GET', `${base}/root/search(q='${literal}')`, {
      query: { $top: top },
    });
    return parseBody(DriveItemCollectionSchema, response, 'search results').value;
  }

  public async getDrive(address: DriveAddress): Promise<Drive> {
    const base = await this.resolveDrivePath(address);
    const response = await this.client.call('GET', base);
    return parseBody(DriveSchema, response, 'drive');
  }
}
