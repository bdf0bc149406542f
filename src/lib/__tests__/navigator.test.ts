import { describe, it, expect, vi } from 'vitest'
import {
  Navigator,
  NavigatorClosedError,
  comparisonRequest,
  type ClosableView,
  type ComparisonRequest,
  type ComparisonViewer,
  type NavigatorDeps,
} from '../navigator'
import type { Commit, Repository, ReviewSession } from '../review'
import { baseCommit, headCommit, makeCommit, makeSession, repository } from './fixtures'

interface FakeView extends ClosableView {
  request: ComparisonRequest
  focusCount: number
  closed: boolean
}

// Records opened comparisons; closing a view fires its listeners once
class FakeViewer implements ComparisonViewer {
  views: FakeView[] = []

  open(request: ComparisonRequest): FakeView {
    const listeners: Array<() => void> = []
    const view: FakeView = {
      request,
      focusCount: 0,
      closed: false,
      focus: () => {
        view.focusCount++
      },
      close: () => {
        if (view.closed) return
        view.closed = true
        for (const listener of listeners) listener()
      },
      onClose: (listener) => {
        listeners.push(listener)
      },
    }
    this.views.push(view)
    return view
  }
}

function nestedSession(commit: Commit): ReviewSession {
  return makeSession({
    description: commit.message,
    comparison: {
      repository,
      base: commit.parents[0] ?? `${commit.sha}^`,
      head: commit.sha,
      commits: [commit],
      files: [{ path: 'a.go', status: 'modified', additions: 1, deletions: 0 }],
    },
    chain: [commit],
  })
}

function setup(session: ReviewSession = makeSession()) {
  const viewer = new FakeViewer()
  const calls: string[] = []
  const resolveContent = vi.fn(async (_repository: Repository, revision: string, path: string) => {
    calls.push(`${revision}:${path}`)
    return path === 'gone.go' && revision === 'h1h1h1h1h1h1' ? '' : `${path}@${revision}`
  })
  const openCommitSession = vi.fn(async (_repository: Repository, commit: Commit) => nestedSession(commit))
  const deps: NavigatorDeps = { resolveContent, openCommitSession, viewer }
  const navigator = new Navigator(session, deps)
  return { navigator, viewer, calls, resolveContent, openCommitSession }
}

describe('comparisonRequest', () => {
  it('should label a plain file with repository, path and short revisions', () => {
    const request = comparisonRequest(
      { repository, baseRevision: 'base000000000', headRevision: 'h1h1h1h1h1h1', path: 'a.go', basePath: 'a.go' },
      'old',
      'new'
    )

    expect(request.label).toBe('octo/demo: a.go @ base000..h1h1h1h')
    expect(request.base).toEqual({ revision: 'base000000000', path: 'a.go', content: 'old' })
    expect(request.head).toEqual({ revision: 'h1h1h1h1h1h1', path: 'a.go', content: 'new' })
  })

  it('should show both paths for a rename', () => {
    const request = comparisonRequest(
      { repository, baseRevision: 'b', headRevision: 'h', path: 'pkg/new.go', basePath: 'pkg/old.go' },
      '',
      ''
    )

    expect(request.label).toBe('octo/demo: pkg/old.go → pkg/new.go @ b..h')
  })
})

describe('Navigator', () => {
  it('should start listing with the cursor on the first commit', () => {
    const { navigator } = setup()

    expect(navigator.getSnapshot()).toEqual({
      status: 'listing',
      cursor: { section: 'commit', index: 0 },
      focused: null,
      openFiles: [],
      openCommits: [],
      child: null,
    })
  })

  it('should start with no cursor for an empty session', () => {
    const { navigator } = setup(
      makeSession({ comparison: { repository, base: 'a', head: 'a', commits: [], files: [] }, chain: [] })
    )

    expect(navigator.getSnapshot().cursor).toBeNull()
  })

  describe('activateFile', () => {
    it('should resolve base then head and open a comparison', async () => {
      const { navigator, viewer, calls } = setup()

      await navigator.activateFile(0)

      expect(calls).toEqual(['base000000000:a.go', 'h1h1h1h1h1h1:a.go'])
      expect(viewer.views).toHaveLength(1)
      expect(viewer.views[0].request.label).toBe('octo/demo: a.go @ base000..h1h1h1h')
      expect(viewer.views[0].request.base.content).toBe('a.go@base000000000')
      expect(viewer.views[0].request.head.content).toBe('a.go@h1h1h1h1h1h1')

      const snapshot = navigator.getSnapshot()
      expect(snapshot.status).toBe('viewing')
      expect(snapshot.openFiles).toEqual([0])
      expect(snapshot.focused).toEqual({ section: 'file', index: 0 })
    })

    it('should read the base side of a rename from its previous path', async () => {
      const { navigator, calls } = setup()

      await navigator.activateFile(1)

      expect(calls).toEqual(['base000000000:pkg/old.go', 'h1h1h1h1h1h1:pkg/new.go'])
    })

    it('should show an empty head side for a removed file', async () => {
      const { navigator, viewer } = setup()

      await navigator.activateFile(2)

      expect(viewer.views[0].request.base.content).toBe('gone.go@base000000000')
      expect(viewer.views[0].request.head.content).toBe('')
    })

    it('should focus a live comparison instead of opening another', async () => {
      const { navigator, viewer, resolveContent } = setup()

      await navigator.activateFile(0)
      await navigator.activateFile(0)

      expect(viewer.views).toHaveLength(1)
      expect(viewer.views[0].focusCount).toBe(1)
      expect(resolveContent).toHaveBeenCalledTimes(2)
    })

    it('should open once when activated twice before content arrives', async () => {
      const { navigator, viewer } = setup()

      await Promise.all([navigator.activateFile(0), navigator.activateFile(0)])

      expect(viewer.views).toHaveLength(1)
    })

    it('should open a fresh comparison after the previous one closed', async () => {
      const { navigator, viewer } = setup()

      await navigator.activateFile(0)
      viewer.views[0].close()
      await navigator.activateFile(0)

      expect(viewer.views).toHaveLength(2)
      expect(navigator.getSnapshot().openFiles).toEqual([0])
    })

    it('should pass content errors through and open nothing', async () => {
      const { navigator, viewer, resolveContent } = setup()
      resolveContent.mockRejectedValueOnce(new Error('GitHub API error 401'))

      await expect(navigator.activateFile(0)).rejects.toThrow('GitHub API error 401')

      expect(viewer.views).toHaveLength(0)
      expect(navigator.getSnapshot().status).toBe('listing')
      expect(navigator.getSnapshot().openFiles).toEqual([])
    })

    it('should reject an index past the file list', () => {
      const { navigator } = setup()

      expect(() => navigator.activateFile(3)).toThrow(RangeError)
    })
  })

  describe('closing a comparison', () => {
    it('should return to listing with the cursor on the file', async () => {
      const { navigator, viewer } = setup()

      await navigator.activateFile(1)
      navigator.select({ section: 'commit', index: 0 })
      viewer.views[0].close()

      expect(navigator.getSnapshot()).toMatchObject({
        status: 'listing',
        cursor: { section: 'file', index: 1 },
        focused: null,
        openFiles: [],
      })
    })

    it('should keep viewing while another comparison is open', async () => {
      const { navigator, viewer } = setup()

      await navigator.activateFile(0)
      await navigator.activateFile(2)
      viewer.views[0].close()

      expect(navigator.getSnapshot()).toMatchObject({
        status: 'viewing',
        cursor: { section: 'file', index: 0 },
        focused: { section: 'file', index: 2 },
        openFiles: [2],
      })
    })
  })

  describe('activateCommit', () => {
    it('should open a nested session for the commit', async () => {
      const { navigator, openCommitSession } = setup()

      await navigator.activateCommit(1)

      expect(openCommitSession).toHaveBeenCalledWith(repository, headCommit)
      const { child, status, openCommits } = navigator.getSnapshot()
      expect(status).toBe('viewing')
      expect(openCommits).toEqual([1])
      expect(child?.session.comparison.base).toBe('b0b0b0b0b0b0')
      expect(child?.session.comparison.head).toBe('h1h1h1h1h1h1')
    })

    it('should share collaborators with the nested navigator', async () => {
      const { navigator, viewer } = setup()

      await navigator.activateCommit(1)
      await navigator.getSnapshot().child?.activateFile(0)

      expect(viewer.views).toHaveLength(1)
      expect(viewer.views[0].request.label).toBe('octo/demo: a.go @ b0b0b0b..h1h1h1h')
    })

    it('should reuse a live nested session', async () => {
      const { navigator, openCommitSession } = setup()

      await navigator.activateCommit(0)
      const first = navigator.getSnapshot().child
      await navigator.activateCommit(0)

      expect(openCommitSession).toHaveBeenCalledTimes(1)
      expect(navigator.getSnapshot().child).toBe(first)
    })

    it('should restore the cursor to the commit when the nested session closes', async () => {
      const { navigator } = setup()

      await navigator.activateCommit(1)
      navigator.moveCursor(2)
      navigator.getSnapshot().child?.close()

      expect(navigator.getSnapshot()).toMatchObject({
        status: 'listing',
        cursor: { section: 'commit', index: 1 },
        openCommits: [],
        child: null,
      })
    })

    it('should use the commit message of a root commit', async () => {
      const root = makeCommit('r00t00000000', [], 'Root')
      const { navigator, openCommitSession } = setup(makeSession({ chain: [root, headCommit] }))

      await navigator.activateCommit(0)

      expect(openCommitSession).toHaveBeenCalledWith(repository, root)
      expect(navigator.getSnapshot().child?.session.comparison.base).toBe('r00t00000000^')
    })
  })

  describe('cursor', () => {
    it('should move through commits then files and stop at the ends', () => {
      const { navigator } = setup()

      navigator.moveCursor(1)
      expect(navigator.getSnapshot().cursor).toEqual({ section: 'commit', index: 1 })
      navigator.moveCursor(1)
      expect(navigator.getSnapshot().cursor).toEqual({ section: 'file', index: 0 })
      navigator.moveCursor(10)
      expect(navigator.getSnapshot().cursor).toEqual({ section: 'file', index: 2 })
      navigator.moveCursor(-100)
      expect(navigator.getSnapshot().cursor).toEqual({ section: 'commit', index: 0 })
    })

    it('should activate the row under the cursor', async () => {
      const { navigator, viewer } = setup()

      navigator.select({ section: 'file', index: 2 })
      await navigator.activateCursor()

      expect(viewer.views[0].request.head.path).toBe('gone.go')
    })

    it('should notify subscribers with a new snapshot', () => {
      const { navigator } = setup()
      const listener = vi.fn()
      const before = navigator.getSnapshot()

      const unsubscribe = navigator.subscribe(listener)
      navigator.moveCursor(1)
      unsubscribe()
      navigator.moveCursor(1)

      expect(listener).toHaveBeenCalledTimes(1)
      expect(navigator.getSnapshot()).not.toBe(before)
    })
  })

  describe('close', () => {
    it('should close every live view and nested session', async () => {
      const { navigator, viewer } = setup()
      const onClose = vi.fn()
      navigator.onClose(onClose)

      await navigator.activateFile(0)
      await navigator.activateCommit(0)
      const child = navigator.getSnapshot().child
      await child?.activateFile(0)
      navigator.close()

      expect(viewer.views.map((view) => view.closed)).toEqual([true, true])
      expect(child?.getSnapshot().status).toBe('closed')
      expect(navigator.getSnapshot()).toMatchObject({ status: 'closed', openFiles: [], openCommits: [], child: null })
      expect(onClose).toHaveBeenCalledTimes(1)
    })

    it('should be safe to close twice', () => {
      const { navigator } = setup()
      const onClose = vi.fn()
      navigator.onClose(onClose)

      navigator.close()
      navigator.close()

      expect(onClose).toHaveBeenCalledTimes(1)
    })

    it('should refuse activation once closed', async () => {
      const { navigator } = setup()

      navigator.close()

      await expect(navigator.activateFile(0)).rejects.toBeInstanceOf(NavigatorClosedError)
      await expect(navigator.activateCursor()).rejects.toBeInstanceOf(NavigatorClosedError)
      expect(() => navigator.moveCursor(1)).toThrow(NavigatorClosedError)
    })

    it('should not open a view whose content arrives after close', async () => {
      const { navigator, viewer } = setup()

      const opening = navigator.activateFile(0)
      navigator.close()
      await opening

      expect(viewer.views).toHaveLength(0)
    })
  })

  it('should list commits from the fixture chain', () => {
    const { navigator } = setup()

    expect(navigator.rows.commits.map((row) => row.activation)).toEqual([
      { type: 'commit', index: 0, commit: baseCommit },
      { type: 'commit', index: 1, commit: headCommit },
    ])
  })
})
