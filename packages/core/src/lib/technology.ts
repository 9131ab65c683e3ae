export const DEFAULT_TECHNOLOGY = 'general'

/** File extension → technology */
export const EXTENSION_TECHNOLOGY: Readonly<Record<string, string>> = {
  py: 'python',
  js: 'javascript',
  jsx: 'javascript',
  ts: 'typescript',
  tsx: 'typescript',
  swift: 'swift',
  go: 'golang',
  rb: 'ruby',
  java: 'java',
  kt: 'kotlin',
  cs: 'csharp',
  php: 'php',
  rs: 'rust',
}

/**
 * Served by `GET /api/v1/technologies`. Hardcoded: it is not derived from
 * the rules repository and may list technologies that have no rules.
 */
export const KNOWN_TECHNOLOGIES: readonly string[] = [
  'python', 'javascript', 'typescript', 'rust', 'golang',
  'java', 'kotlin', 'swift', 'ruby', 'csharp', 'php',
]

/** Checked in order against a project's top-level entries; first hit wins */
export const PROJECT_MARKERS: ReadonlyArray<readonly [file: string, technology: string]> = [
  ['package.json', 'javascript'],
  ['tsconfig.json', 'typescript'],
  ['requirements.txt', 'python'],
  ['setup.py', 'python'],
  ['Cargo.toml', 'rust'],
  ['go.mod', 'golang'],
  ['pom.xml', 'java'],
  ['build.gradle', 'java'],
  ['Gemfile', 'ruby'],
  ['composer.json', 'php'],
  ['.swift-version', 'swift'],
  ['Package.swift', 'swift'],
]

/** Text after the last `.`, or null when the path has none */
export function fileExtension(filePath: string): string | null {
  const i = filePath.lastIndexOf('.')
  return i >= 0 ? filePath.slice(i + 1) : null
}

export function technologyForExtension(ext: string | null | undefined): string | null {
  if (!ext) return null
  return Object.hasOwn(EXTENSION_TECHNOLOGY, ext) ? EXTENSION_TECHNOLOGY[ext] ?? null : null
}

export function technologyForFile(filePath: string): string {
  return technologyForExtension(fileExtension(filePath)) ?? DEFAULT_TECHNOLOGY
}
