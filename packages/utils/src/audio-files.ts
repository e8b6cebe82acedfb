/**
 * Audio file naming helpers
 *
 * Practice folders hold takes named after the song they contain
 * (e.g. "Wonderwall.wav", "wonderwall_take2.wav"); these helpers
 * turn filenames into the labels shown to users.
 */

/**
 * Extensions recognised as audio files (lowercase, with leading dot)
 */
const AUDIO_EXTENSIONS = [".wav", ".wave", ".mp3", ".flac", ".ogg", ".m4a", ".aac"];

/**
 * Check whether a filename looks like an audio file
 */
export function isAudioFile(fileName: string): boolean {
  const lower = fileName.toLowerCase();
  if (lower.startsWith(".")) return false;
  return AUDIO_EXTENSIONS.some((ext) => lower.endsWith(ext));
}

/**
 * Strip directory and extension from a file reference
 *
 * @example
 * extractSongName("2024-05-01/Wonderwall.wav") // "Wonderwall"
 */
export function extractSongName(fileRef: string): string {
  const parts = fileRef.split(/[\\/]/);
  const base = parts[parts.length - 1];
  const dot = base.lastIndexOf(".");
  return dot > 0 ? base.slice(0, dot) : base;
}
