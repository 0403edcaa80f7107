import type { ContainerExtension } from '../../types/index.js'

export const SUPPORTED_CONTAINERS: readonly ContainerExtension[] = ['.mp4', '.m4v', '.mov', '.mkv']

/** Containers written by FFmpeg's mov/mp4 muxer (track timescale, faststart). */
const MOV_FAMILY: readonly ContainerExtension[] = ['.mp4', '.m4v', '.mov']

/** Containers that cannot carry PCM audio. */
const MP4_FAMILY: readonly ContainerExtension[] = ['.mp4', '.m4v']

function isContainerExtension(ext: string): ext is ContainerExtension {
  return (SUPPORTED_CONTAINERS as readonly string[]).includes(ext)
}

/** Lowercased extension of `filePath` if it is a supported container, else null. */
export function containerOf(filePath: string): ContainerExtension | null {
  const match = /\.[^./\\]+$/.exec(filePath)
  if (!match) return null
  const ext = match[0].toLowerCase()
  return isContainerExtension(ext) ? ext : null
}

export function isMovFamily(container: ContainerExtension): boolean {
  return MOV_FAMILY.includes(container)
}

export function carriesPcmAudio(container: ContainerExtension): boolean {
  return !MP4_FAMILY.includes(container)
}

/** The mp4 muxer has no ProRes mapping; only mov and Matroska carry it. */
export function carriesProres(container: ContainerExtension): boolean {
  return !MP4_FAMILY.includes(container)
}
