import { promises as fsp } from 'fs'
import { extname, join } from 'path'
import type { FolderUploadItem } from '../services/TransferConnection'

async function exists(path: string): Promise<boolean> {
  try {
    await fsp.access(path)
    return true
  } catch {
    return false
  }
}

/**
 * First free variant of `path`: the path itself, then "name (1).ext",
 * "name (2).ext", ...
 */
export async function uniqueDestination(path: string): Promise<string> {
  if (!(await exists(path))) return path

  const ext = extname(path)
  const stem = path.slice(0, path.length - ext.length)
  for (let n = 1; ; n++) {
    const candidate = `${stem} (${n})${ext}`
    if (!(await exists(candidate))) return candidate
  }
}

/**
 * Items of a local folder in upload order: each folder before its contents,
 * names sorted, hidden entries skipped. Paths are relative to `root`.
 */
export async function collectFolderItems(root: string, relative: string[] = []): Promise<FolderUploadItem[]> {
  const dir = join(root, ...relative)
  const entries = await fsp.readdir(dir, { withFileTypes: true })
  entries.sort((a, b) => a.name.localeCompare(b.name))

  const items: FolderUploadItem[] = []
  for (const entry of entries) {
    if (entry.name.startsWith('.')) continue
    const path = [...relative, entry.name]
    const localPath = join(root, ...path)

    if (entry.isDirectory()) {
      items.push({ path, isFolder: true, localPath, size: 0 })
      items.push(...(await collectFolderItems(root, path)))
    } else if (entry.isFile()) {
      const stat = await fsp.stat(localPath)
      items.push({ path, isFolder: false, localPath, size: stat.size })
    }
  }
  return items
}
