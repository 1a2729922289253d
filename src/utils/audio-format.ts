import { extname } from 'path'

const CONTENT_TYPES: Record<string, string> = {
  '.mp3': 'audio/mpeg',
  '.ogg': 'audio/ogg',
  '.oga': 'audio/ogg',
  '.opus': 'audio/ogg',
  '.wav': 'audio/wav',
  '.m4a': 'audio/mp4',
  '.aac': 'audio/aac',
  '.flac': 'audio/flac',
  '.aif': 'audio/aiff',
  '.aiff': 'audio/aiff',
}

/**
 * Content type for an audio file path or URL, by extension
 */
export function audioContentType(pathOrUrl: string, fallback = 'application/octet-stream'): string {
  const path = pathOrUrl.split(/[?#]/, 1)[0] ?? pathOrUrl
  return CONTENT_TYPES[extname(path).toLowerCase()] ?? fallback
}
