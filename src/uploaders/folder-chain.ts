import { logger, type LogCategory } from '../logger.js';
import { splitFolderPath } from '../utils.js';

/**
 * Folder primitives a cloud backend exposes. Ids are opaque: Drive uses file
 * ids, Yandex Disk uses absolute paths.
 */
export interface FolderApi {
  findFolder(parentId: string, name: string): Promise<string | null>;
  createFolder(parentId: string, name: string): Promise<string>;
}

/**
 * Walks the slash separated path from `rootId`, reusing an existing child
 * folder for each segment and creating it only when the lookup finds none.
 * Returns the id of the deepest folder.
 */
export const ensureFolderChain = async (
  api: FolderApi,
  rootId: string,
  folderPath: string,
  category: LogCategory = 'upload',
): Promise<string> => {
  let parentId = rootId;
  for (const name of splitFolderPath(folderPath)) {
    const existing = await api.findFolder(parentId, name);
    if (existing) {
      logger.debug(category, `Found folder '${name}' (${existing})`);
      parentId = existing;
      continue;
    }
    logger.info(category, `Creating folder '${name}' under ${parentId || '/'}`);
    parentId = await api.createFolder(parentId, name);
  }
  return parentId;
};
