import fluentFfmpeg from 'fluent-ffmpeg'

export { fluentFfmpeg }
export type { FfmpegCommand, FfmpegCommandOptions } from 'fluent-ffmpeg'
