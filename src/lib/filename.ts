// Spaces become underscores; anything but letters, digits, _ . - is dropped.
export function validFilename(name: string): string {
  return name.trim().replace(/ /g, '_').replace(/[^-\p{L}\p{N}_.]/gu, '')
}

export function clipFileName(position: number, label: string | undefined): string {
  const base = validFilename(label ?? '') || 'clip'
  return `${String(position + 1).padStart(2, '0')}_${base}.mp4`
}
