import { describe, it, expect } from 'vitest'
import { RunTree, nextNode } from '../src/run-tree.js'
import type { RunNode } from '../src/run-tree.js'
import type { Run } from '../src/types.js'

const compare = (a: number, b: number) => a - b

function treeOf(runs: Run<number>[]): RunTree<number> {
  const tree = new RunTree(compare)
  for (const run of runs) tree.insert(run)
  return tree
}

/** AVL条件・サイズ・parent ポインタを再帰的に検証し、高さを返す */
function checkNode(node: RunNode<number> | null, parent: RunNode<number> | null): number {
  if (node === null) return 0
  expect(node.parent).toBe(parent)
  const lh = checkNode(node.left, node)
  const rh = checkNode(node.right, node)
  expect(Math.abs(lh - rh)).toBeLessThanOrEqual(1)
  expect(node.height).toBe(1 + Math.max(lh, rh))
  expect(node.size).toBe(1 + (node.left?.size ?? 0) + (node.right?.size ?? 0))
  return node.height
}

describe('RunTree', () => {
  describe('基本操作', () => {
    it('空の木はlength 0', () => {
      const tree = new RunTree(compare)
      expect(tree.length).toBe(0)
      expect(tree.toArray()).toEqual([])
      expect(tree.floor(0)).toBeNull()
      expect(tree.ceiling(0)).toBeNull()
    })

    it('任意順に挿入しても開始位置順に並ぶ', () => {
      const tree = treeOf([[10, 12], [0, 2], [5, 7]])
      expect(tree.length).toBe(3)
      expect(tree.toArray()).toEqual([[0, 2], [5, 7], [10, 12]])
    })

    it('同じ開始位置のランの挿入は例外', () => {
      const tree = treeOf([[0, 2]])
      expect(() => tree.insert([0, 5])).toThrow('無効な状態')
    })

    it('remove で開始位置が一致するランを削除', () => {
      const tree = treeOf([[10, 12], [0, 2], [5, 7]])
      expect(tree.remove(5)).toBe(true)
      expect(tree.remove(5)).toBe(false)
      expect(tree.remove(1)).toBe(false)
      expect(tree.toArray()).toEqual([[0, 2], [10, 12]])
    })

    it('clear で全ランを削除', () => {
      const tree = treeOf([[0, 2], [5, 7]])
      tree.clear()
      expect(tree.length).toBe(0)
    })
  })

  describe('floor / ceiling', () => {
    const tree = treeOf([[0, 2], [5, 7], [10, 12]])

    it('floor は開始位置が key 以下で最大のランを返す', () => {
      expect(tree.floor(-1)).toBeNull()
      expect(tree.floor(0)?.run).toEqual([0, 2])
      expect(tree.floor(6)?.run).toEqual([5, 7])
      expect(tree.floor(9)?.run).toEqual([5, 7])
      expect(tree.floor(100)?.run).toEqual([10, 12])
    })

    it('ceiling は開始位置が key 以上で最小のランを返す', () => {
      expect(tree.ceiling(-1)?.run).toEqual([0, 2])
      expect(tree.ceiling(1)?.run).toEqual([5, 7])
      expect(tree.ceiling(5)?.run).toEqual([5, 7])
      expect(tree.ceiling(11)).toBeNull()
    })
  })

  describe('nextNode', () => {
    it('in-order で次のノードを辿る', () => {
      const tree = new RunTree(compare)
      for (let i = 0; i < 20; i++) tree.insert([i * 3, i * 3 + 1])

      const starts: number[] = []
      let node = tree.ceiling(-Infinity)
      while (node !== null) {
        starts.push(node.run[0])
        node = nextNode(node)
      }
      expect(starts).toEqual(Array.from({ length: 20 }, (_, i) => i * 3))
    })
  })

  describe('平衡', () => {
    it('fromSorted は平衡木を構築する', () => {
      const runs: Run<number>[] = Array.from({ length: 7 }, (_, i) => [i * 2, i * 2 + 1])
      const tree = RunTree.fromSorted(runs, compare)
      expect(tree.length).toBe(7)
      expect(tree.toArray()).toEqual(runs)
      expect(checkNode(tree._root, null)).toBe(3)
    })

    it('昇順に1000個挿入しても高さは対数に収まる', () => {
      const tree = new RunTree(compare)
      for (let i = 0; i < 1000; i++) tree.insert([i * 2, i * 2 + 1])
      expect(tree.length).toBe(1000)
      expect(checkNode(tree._root, null)).toBeLessThanOrEqual(15)
    })

    it('ランダムな挿入・削除でソート済み配列と一致する', () => {
      let state = 42
      const rng = () => {
        state ^= state << 13
        state ^= state >> 17
        state ^= state << 5
        return (state >>> 0) / 0xffffffff
      }

      const tree = new RunTree(compare)
      const starts = new Set<number>()

      for (let i = 0; i < 500; i++) {
        const start = Math.floor(rng() * 200)
        if (starts.has(start)) {
          expect(tree.remove(start)).toBe(true)
          starts.delete(start)
        } else {
          tree.insert([start, start + 1])
          starts.add(start)
        }
      }

      const expected = [...starts].sort((a, b) => a - b).map(s => [s, s + 1])
      expect(tree.toArray()).toEqual(expected)
      checkNode(tree._root, null)
    })
  })
})
