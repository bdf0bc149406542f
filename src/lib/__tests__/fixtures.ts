import type { Commit, ReviewSession } from '../review'

export const repository = { owner: 'octo', repo: 'demo' }

export function makeCommit(sha: string, parents: string[], message: string, author = 'Ada Lovelace'): Commit {
  return { sha, parents, author, message }
}

export const baseCommit = makeCommit('b0b0b0b0b0b0', [], 'Initial import')
export const headCommit = makeCommit('h1h1h1h1h1h1', ['b0b0b0b0b0b0'], 'Fix parser\n\nLonger explanation', 'Grace Hopper')

export function makeSession(overrides: Partial<ReviewSession> = {}): ReviewSession {
  return {
    description: '#12 Fix parser',
    comparison: {
      repository,
      base: 'base000000000',
      head: 'h1h1h1h1h1h1',
      commits: [headCommit, baseCommit],
      files: [
        { path: 'a.go', status: 'modified', additions: 3, deletions: 1 },
        { path: 'pkg/new.go', previousPath: 'pkg/old.go', status: 'renamed', additions: 2, deletions: 2 },
        { path: 'gone.go', status: 'removed', additions: 0, deletions: 7 },
      ],
    },
    chain: [baseCommit, headCommit],
    ...overrides,
  }
}
