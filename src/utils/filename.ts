const ILLEGAL_FILENAME_CHARS = /[\\/*?:"<>|]/g;

/**
 * Strip characters that are not allowed in file names on common filesystems.
 * No replacement character is inserted; an all-illegal input becomes ''.
 */
export function sanitizeFilename(name: string): string {
  return name.replace(ILLEGAL_FILENAME_CHARS, '').trim();
}
