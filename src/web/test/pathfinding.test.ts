import { describe, expect, it, vi } from 'vitest'
import { AdjacencyGraph } from '../utils/adjacency'
import type { Path } from '../utils/models'
import { cellAssignments, findPath, PathEnumerator } from '../utils/pathfinding'
import { Trie } from '../utils/trie'
import { testBoard } from './util.test'

const indices = (path: Path) => path.map(cell => cell.index)

describe('PathEnumerator', () => {
  const board = testBoard('catsxxxxxxxxxxxx')
  const graph = new AdjacencyGraph(board)
  const trie = new Trie(['CAT', 'CATS', 'AT'])
  const [c, a, t, s] = board.cells

  it('should find the only path spelling a word between two cells', () => {
    const paths = [...new PathEnumerator(graph, trie, c, t)]
    expect(paths.map(indices)).toEqual([[0, 1, 2]])
  })

  it('should extend through intermediate cells that keep a valid prefix', () => {
    const paths = [...new PathEnumerator(graph, trie, c, s)]
    expect(paths.map(indices)).toEqual([[0, 1, 2, 3]])
  })

  it('should yield nothing when the source face starts no word', () => {
    expect([...new PathEnumerator(graph, trie, t, c)]).toEqual([])
  })

  it('should not yield words shorter than three letters', () => {
    // AT is in the dictionary but too short to count
    expect([...new PathEnumerator(graph, trie, a, t)]).toEqual([])
  })

  it('should yield nothing from a cell to itself', () => {
    expect([...new PathEnumerator(graph, trie, c, c)]).toEqual([])
  })

  it('should expose the partial path while suspended', () => {
    const enumerator = new PathEnumerator(graph, trie, c, s)
    expect(enumerator.depth).toBe(1)
    expect(indices(enumerator.path)).toEqual([0])

    const first = enumerator.next()
    expect(first.done).toBe(false)
    expect(indices(enumerator.path)).toEqual([0, 1, 2])

    expect(enumerator.next().done).toBe(true)
    expect(enumerator.depth).toBe(0)
    expect(enumerator.next().done).toBe(true)
  })

  it('should reproduce the same sequence from a fresh enumerator', () => {
    const first = [...new PathEnumerator(graph, trie, c, s)].map(indices)
    const second = [...new PathEnumerator(graph, trie, c, s)].map(indices)
    expect(second).toEqual(first)
  })

  it('should reach a path through every cell at the length cutoff', () => {
    // Snake through the board: left to right, then right to left, and so on
    const snake = testBoard('abcdefghijklmnop')
    const snakeGraph = new AdjacencyGraph(snake)
    const snakeTrie = new Trie(['ABCDHGFEIJKLPONM'])

    const paths = [...new PathEnumerator(snakeGraph, snakeTrie, snake.cells[0], snake.cells[12])]

    expect(paths.map(indices)).toEqual([[0, 1, 2, 3, 7, 6, 5, 4, 8, 9, 10, 11, 15, 14, 13, 12]])
  })

  it('should keep every yielded path simple and every prefix valid', () => {
    const wordBoard = testBoard('tapesrotlinedogs')
    const wordGraph = new AdjacencyGraph(wordBoard)
    const words = new Trie(['TAP', 'TAPE', 'PET', 'DOG', 'DOGS', 'ROT', 'NOT', 'TEN', 'LID'])

    const yielded: Path[] = []
    for (const source of wordBoard.cells) {
      for (const target of wordBoard.cells) {
        yielded.push(...new PathEnumerator(wordGraph, words, source, target))
      }
    }

    expect(yielded.length).toBeGreaterThan(0)
    for (const path of yielded) {
      expect(wordGraph.isSimplePath(path)).toBe(true)
      const faces = path.map(cell => cell.face)
      for (let length = 1; length <= faces.length; length++) {
        expect(words.isValidPrefix(faces.slice(0, length))).toBe(true)
      }
      expect(words.isWord(faces)).toBe(true)
    }
  })

  it('should not extend a partial path past its last valid prefix', () => {
    // CATS needs an S the board lacks, so CAT is the deepest valid prefix
    const board = testBoard('catxxxxxxxxxxxxx')
    const words = new Trie(['CATS'])
    const isValidPrefix = words.isValidPrefix.bind(words)
    const depths: number[] = []
    let enumerator: PathEnumerator | null = null
    vi.spyOn(words, 'isValidPrefix').mockImplementation(sequence => {
      if (enumerator) depths.push(enumerator.depth)
      return isValidPrefix(sequence)
    })

    enumerator = new PathEnumerator(new AdjacencyGraph(board), words, board.cells[0], board.cells[15])

    expect(enumerator.next().done).toBe(true)
    expect(depths).toEqual([1, 2, 3, 3, 3, 3, 2, 2, 2, 1, 1])
  })

  it('should throw the abort reason once aborted', () => {
    const controller = new AbortController()
    const enumerator = new PathEnumerator(graph, trie, c, s, { signal: controller.signal })
    const reason = new Error('search cancelled')
    controller.abort(reason)

    let thrown: unknown
    try {
      enumerator.next()
    } catch (error) {
      thrown = error
    }
    expect(thrown).toBe(reason)
  })

  it('should throw the default abort reason when none is given', () => {
    const controller = new AbortController()
    const enumerator = new PathEnumerator(graph, trie, c, s, { signal: controller.signal })
    controller.abort()

    let thrown: unknown
    try {
      enumerator.next()
    } catch (error) {
      thrown = error
    }
    expect(thrown).toBe(controller.signal.reason)
    expect(thrown).toBeDefined()
  })
})

describe('findPath', () => {
  it('should find a path for a word on the board', () => {
    const board = testBoard('catsxxxxxxxxxxxx')
    const graph = new AdjacencyGraph(board)

    expect(indices(findPath(graph, 'cats') ?? [])).toEqual([0, 1, 2, 3])
  })

  it('should return null when the letters are not connected', () => {
    const board = testBoard('cxaxxxxxxxxxxxxt')
    const graph = new AdjacencyGraph(board)

    expect(findPath(graph, 'CAT')).toBeNull()
    expect(findPath(graph, '')).toBeNull()
  })

  it('should never reuse a cell', () => {
    const board = testBoard('abxxxxxxxxxxxxxx')
    const graph = new AdjacencyGraph(board)

    expect(findPath(graph, 'ABA')).toBeNull()
  })

  it('should match a Qu face as two letters', () => {
    const board = testBoard('qitxxxxxxxxxxxxx')
    const graph = new AdjacencyGraph(board)

    expect(indices(findPath(graph, 'QUIT') ?? [])).toEqual([0, 1, 2])
    expect(findPath(graph, 'QIT')).toBeNull()
  })
})

describe('cellAssignments', () => {
  it('should list every distinct cell assignment for the letters', () => {
    const board = testBoard('axaxxxxxxxxxxxxx')
    const assignments = [...cellAssignments(board.cells, 'AXA')].map(indices)

    // Two choices for the first A, 14 X cells, the other A last
    expect(assignments).toHaveLength(28)
    expect(assignments[0]).toEqual([0, 1, 2])
  })
})
