import { appendThumbnail } from '../L3-services/thumbnailAppend/thumbnailAppend.js'
import { writeAtomically } from '../L3-services/atomicOutput/atomicOutput.js'
import { fileExists } from '../L1-infra/fileSystem/fileSystem.js'
import { basename, dirname, extname, join, resolve } from '../L1-infra/paths/paths.js'
import logger, { sanitizeForLog } from '../L1-infra/logger/configLogger.js'
import type { AppConfig } from '../L1-infra/config/environment.js'
import { SUPPORTED_CONTAINERS, containerOf } from '../L0-pure/containers/containers.js'
import { ValidationError } from '../L0-pure/errors/errors.js'
import type { AppendOptions, AppendResult, AppendStrategy } from '../types/index.js'

/** Image extensions tried, in order, when `--pair` infers the still. */
export const PAIR_IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.webp'] as const

export const DEFAULT_DURATION = 0.3
export const DEFAULT_CRF = 18
export const DEFAULT_AUDIO_BITRATE = '192k'

/** One append as the user asked for it, before any path is resolved. */
export interface AppendJob {
  pair?: string
  video?: string
  thumb?: string
  out?: string
  duration: number
  crf: number
  audioBitrate: string
  inplace: boolean
  strategy: AppendStrategy
}

export interface ResolvedJob {
  videoPath: string
  imagePath: string
  /** Final location of the result; the source itself for in-place runs */
  destination: string
  inplace: boolean
  options: AppendOptions
}

export interface JobOutcome extends ResolvedJob {
  result: AppendResult
}

// ── Validation ─────────────────────────────────────────────────

export function validateOptions(job: Pick<AppendJob, 'duration' | 'crf' | 'audioBitrate'>): void {
  if (!Number.isFinite(job.duration) || job.duration <= 0) {
    throw new ValidationError(`Still duration must be a positive number of seconds, got ${job.duration}`)
  }
  if (!Number.isInteger(job.crf) || job.crf < 0 || job.crf > 51) {
    throw new ValidationError(`CRF must be an integer between 0 and 51, got ${job.crf}`)
  }
  if (!/^\d+(\.\d+)?[kKmM]?$/.test(job.audioBitrate)) {
    throw new ValidationError(`Invalid audio bitrate "${job.audioBitrate}" (expected e.g. 192k)`)
  }
}

function requireContainer(filePath: string, role: string): void {
  if (!containerOf(filePath)) {
    const ext = extname(filePath) || '(none)'
    throw new ValidationError(
      `Unsupported ${role} container extension ${ext} for ${filePath} (supported: ${SUPPORTED_CONTAINERS.join(', ')})`,
    )
  }
}

/** `<dir>/<stem>.<ext>` for the first image extension that exists beside the video. */
export async function inferPairImage(videoPath: string): Promise<string> {
  const dir = dirname(videoPath)
  const stem = basename(videoPath, extname(videoPath))
  for (const ext of PAIR_IMAGE_EXTENSIONS) {
    const candidate = join(dir, `${stem}${ext}`)
    if (await fileExists(candidate)) return candidate
  }
  throw new ValidationError(
    `No image found for ${videoPath} (tried ${PAIR_IMAGE_EXTENSIONS.map((ext) => `${stem}${ext}`).join(', ')})`,
  )
}

/** `<dir>/<stem>_thumb<ext>` beside the source. */
export function defaultOutputPath(videoPath: string): string {
  const ext = extname(videoPath)
  return join(dirname(videoPath), `${basename(videoPath, ext)}_thumb${ext}`)
}

/**
 * Turn the user's inputs into absolute paths and validated options.
 *
 * @throws ValidationError for missing, conflicting or unsupported inputs
 */
export async function resolveJob(job: AppendJob): Promise<ResolvedJob> {
  if (job.pair && job.video) {
    throw new ValidationError('--pair cannot be combined with -v/--video')
  }
  if (job.pair && job.thumb) {
    throw new ValidationError('--pair infers the image; do not pass -t/--thumb with it')
  }
  if (!job.pair && !job.video) {
    throw new ValidationError('Provide --pair <video> or -v/--video <video> with -t/--thumb <image>')
  }
  if (job.video && !job.thumb) {
    throw new ValidationError('When using -v/--video you must also pass -t/--thumb.')
  }
  if (job.inplace && job.out) {
    throw new ValidationError('--inplace cannot be combined with -o/--out')
  }
  validateOptions(job)

  const videoPath = resolve(job.pair ?? job.video ?? '')
  requireContainer(videoPath, 'source')

  let imagePath: string
  if (job.thumb) {
    imagePath = resolve(job.thumb)
    if (!(await fileExists(imagePath))) {
      throw new ValidationError(`Thumbnail image not found: ${imagePath}`)
    }
  } else {
    imagePath = await inferPairImage(videoPath)
  }

  const destination = job.inplace ? videoPath : resolve(job.out ?? defaultOutputPath(videoPath))
  requireContainer(destination, 'output')
  if (!job.inplace && destination === videoPath) {
    throw new ValidationError(`Output path is the source itself; pass --inplace to overwrite ${videoPath}`)
  }

  return {
    videoPath,
    imagePath,
    destination,
    inplace: job.inplace,
    options: {
      duration: job.duration,
      crf: job.crf,
      audioBitrate: job.audioBitrate,
      strategy: job.strategy,
    },
  }
}

// ── Run ────────────────────────────────────────────────────────

/**
 * Resolve the job, append the still and move the result into place
 * atomically. The destination is untouched unless the whole run succeeds.
 */
export async function processAppend(job: AppendJob, config: AppConfig): Promise<JobOutcome> {
  const resolved = await resolveJob(job)
  logger.info(
    `Appending ${sanitizeForLog(resolved.imagePath)} to ${sanitizeForLog(resolved.videoPath)} ` +
    `(${resolved.options.duration}s, strategy ${resolved.options.strategy})`,
  )

  const result = await writeAtomically(resolved.destination, (stagingPath) =>
    appendThumbnail(
      {
        ...resolved.options,
        videoPath: resolved.videoPath,
        imagePath: resolved.imagePath,
        outputPath: stagingPath,
      },
      config,
    ),
  )

  logger.info(`Finished via ${result.route}: ${sanitizeForLog(resolved.destination)}`)
  return { ...resolved, result: { ...result, outputPath: resolved.destination } }
}
