import { execFileSync } from 'node:child_process'

// null outside a git work tree or when git is unavailable
export function getGitBranch(cwd: string): string | null {
  try {
    const branch = execFileSync('git', ['rev-parse', '--abbrev-ref', 'HEAD'], {
      cwd,
      encoding: 'utf-8',
      stdio: ['ignore', 'pipe', 'ignore'],
      timeout: 2000
    }).trim()
    return branch || null
  } catch {
    return null
  }
}
