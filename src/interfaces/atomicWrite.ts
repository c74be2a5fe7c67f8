import fsp from 'fs/promises'
import path from 'path'

/**
 * Writes through a sibling `.partial` file and renames it into place, so readers
 * never observe a half-written document.
 */
export async function atomicWrite(filePath: string, data: string | Buffer) {
  const dir = path.dirname(filePath)
  const base = path.basename(filePath)
  const tmp = path.join(dir, `.${base}.partial`)
  await fsp.mkdir(dir, { recursive: true })
  if (Buffer.isBuffer(data)) {
    await fsp.writeFile(tmp, data)
  } else {
    await fsp.writeFile(tmp, data, 'utf8')
  }
  await fsp.rename(tmp, filePath)
}

export async function atomicWriteJson(filePath: string, value: unknown) {
  await atomicWrite(filePath, JSON.stringify(value, null, 2) + '\n')
}
