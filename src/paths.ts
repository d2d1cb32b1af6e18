import path from 'node:path'

export const HABITUS_DIR = '.habitus'

export interface MemoryPaths {
  projectPath: string
  root: string
  episodic: string
  semantic: string
  procedural: string
  rules: string
  index: string
  configFile: string
  semanticFiles: {
    patterns: string
    preferences: string
    codePatterns: string
    antiPatterns: string
  }
  rulesMetadata: string
}

export function getProjectPath(): string {
  return process.env.HABITUS_PROJECT_PATH?.trim() || process.cwd()
}

export function resolveMemoryPaths(projectPath: string): MemoryPaths {
  const base = path.join(projectPath, HABITUS_DIR)
  const root = path.join(base, 'memory')
  const episodic = path.join(root, 'episodic')
  const semantic = path.join(root, 'semantic')
  const procedural = path.join(root, 'procedural')

  return {
    projectPath,
    root,
    episodic,
    semantic,
    procedural,
    rules: path.join(base, 'rules'),
    index: path.join(episodic, 'index.json'),
    configFile: path.join(base, 'config.md'),
    semanticFiles: {
      patterns: path.join(semantic, 'patterns.json'),
      preferences: path.join(semantic, 'preferences.json'),
      codePatterns: path.join(semantic, 'code-patterns.json'),
      antiPatterns: path.join(semantic, 'anti-patterns.json')
    },
    rulesMetadata: path.join(procedural, 'rules-metadata.json')
  }
}
