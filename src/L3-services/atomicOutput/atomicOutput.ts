import {
  createSiblingTempFile,
  getFileStats,
  releaseSiblingTempFile,
  removeFile,
  replaceFile,
} from '../../L1-infra/fileSystem/fileSystem.js'
import logger, { sanitizeForLog } from '../../L1-infra/logger/configLogger.js'
import { TcapError } from '../../L0-pure/errors/errors.js'

async function discardStaging(stagingPath: string): Promise<void> {
  try {
    await removeFile(stagingPath)
  } catch (err: unknown) {
    logger.warn(`Could not remove staging file ${sanitizeForLog(stagingPath)}: ${err instanceof Error ? err.message : String(err)}`)
  } finally {
    releaseSiblingTempFile(stagingPath)
  }
}

/**
 * Produce `destination` through a staging file in the same directory.
 *
 * `produce` writes the staging path; on success it is renamed over the
 * destination in one step. On any failure the staging file is removed, the
 * error is re-thrown and the destination keeps its previous content.
 */
export async function writeAtomically<T>(
  destination: string,
  produce: (stagingPath: string) => Promise<T>,
): Promise<T> {
  const stagingPath = await createSiblingTempFile(destination)
  logger.debug(`Staging ${sanitizeForLog(destination)} at ${sanitizeForLog(stagingPath)}`)

  try {
    const result = await produce(stagingPath)
    const { size } = await getFileStats(stagingPath)
    if (size === 0) {
      throw new TcapError(`Refusing to replace ${destination} with an empty file`)
    }
    await replaceFile(stagingPath, destination)
    releaseSiblingTempFile(stagingPath)
    return result
  } catch (err: unknown) {
    await discardStaging(stagingPath)
    throw err
  }
}
