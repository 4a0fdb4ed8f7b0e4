/**
 * 開始位置をキーとするAVL木
 *
 * RunList のラン集合を保持し、floor / ceiling 探索・挿入・削除を O(log n) で行う。
 * parent ポインタにより、ノードから in-order の次ノードへ辿れる。
 * 木自体はラン同士の重なりを検査しない（RunList 側の責務）。
 */

import type { Comparator, Run } from './types.js'

/** ラン木のノード */
export interface RunNode<T> {
  /** 保持するラン */
  run: Run<T>
  /** 左の子 */
  left: RunNode<T> | null
  /** 右の子 */
  right: RunNode<T> | null
  /** 親ノード */
  parent: RunNode<T> | null
  /** AVL木の高さ */
  height: number
  /** サブツリーのノード数 */
  size: number
}

/** ノードを作成 */
function createNode<T>(run: Run<T>): RunNode<T> {
  return {
    run,
    left: null,
    right: null,
    parent: null,
    height: 1,
    size: 1,
  }
}

/** ノードの高さ（nullは0） */
function height<T>(node: RunNode<T> | null): number {
  return node ? node.height : 0
}

/** ノードのサイズ（nullは0） */
function size<T>(node: RunNode<T> | null): number {
  return node ? node.size : 0
}

/** ノードのメタデータを再計算 */
function update<T>(node: RunNode<T>): void {
  node.height = 1 + Math.max(height(node.left), height(node.right))
  node.size = 1 + size(node.left) + size(node.right)
}

/** 子ノードの parent ポインタを設定 */
function setParent<T>(node: RunNode<T>): void {
  if (node.left) node.left.parent = node
  if (node.right) node.right.parent = node
}

/** バランスファクター */
function balanceFactor<T>(node: RunNode<T>): number {
  return height(node.left) - height(node.right)
}

/** 右回転 */
function rotateRight<T>(node: RunNode<T>): RunNode<T> {
  const left = node.left
  if (left === null) return node
  const parent = node.parent
  node.left = left.right
  left.right = node
  update(node)
  setParent(node)
  update(left)
  setParent(left)
  left.parent = parent
  return left
}

/** 左回転 */
function rotateLeft<T>(node: RunNode<T>): RunNode<T> {
  const right = node.right
  if (right === null) return node
  const parent = node.parent
  node.right = right.left
  right.left = node
  update(node)
  setParent(node)
  update(right)
  setParent(right)
  right.parent = parent
  return right
}

/** AVLバランス調整 */
function balance<T>(node: RunNode<T>): RunNode<T> {
  update(node)
  const bf = balanceFactor(node)

  if (bf > 1 && node.left) {
    if (balanceFactor(node.left) < 0) {
      node.left = rotateLeft(node.left)
      node.left.parent = node
    }
    return rotateRight(node)
  }

  if (bf < -1 && node.right) {
    if (balanceFactor(node.right) > 0) {
      node.right = rotateRight(node.right)
      node.right.parent = node
    }
    return rotateLeft(node)
  }

  return node
}

/** 開始位置の順にノードを挿入 */
function insertNode<T>(
  root: RunNode<T> | null,
  newNode: RunNode<T>,
  compare: Comparator<T>,
): RunNode<T> {
  if (root === null) {
    return newNode
  }

  const cmp = compare(newNode.run[0], root.run[0])
  if (cmp < 0) {
    root.left = insertNode(root.left, newNode, compare)
    root.left.parent = root
  } else if (cmp > 0) {
    root.right = insertNode(root.right, newNode, compare)
    root.right.parent = root
  } else {
    throw Error('無効な状態 - 同じ開始位置のランが既に存在します: ' + String(newNode.run[0]))
  }

  return balance(root)
}

/** サブツリーの最小ノード */
function minNode<T>(node: RunNode<T>): RunNode<T> {
  let current = node
  while (current.left !== null) current = current.left
  return current
}

/** 開始位置が start のノードを削除し、新しいサブツリーの根を返す */
function removeNode<T>(
  root: RunNode<T> | null,
  start: T,
  compare: Comparator<T>,
): RunNode<T> | null {
  if (root === null) return null

  const cmp = compare(start, root.run[0])
  if (cmp < 0) {
    root.left = removeNode(root.left, start, compare)
    if (root.left) root.left.parent = root
  } else if (cmp > 0) {
    root.right = removeNode(root.right, start, compare)
    if (root.right) root.right.parent = root
  } else if (root.left === null || root.right === null) {
    // 子が1つ以下 → その子で置き換える
    const child = root.left ?? root.right
    if (child) child.parent = root.parent
    return child
  } else {
    // 子が2つ → 右サブツリーの最小ランを移して、そちらを削除
    const successor = minNode(root.right)
    root.run = successor.run
    root.right = removeNode(root.right, successor.run[0], compare)
    if (root.right) root.right.parent = root
  }

  return balance(root)
}

/** ソート済み配列から平衡木を構築（O(n)） */
function buildBalanced<T>(runs: readonly Run<T>[], lo: number, hi: number): RunNode<T> | null {
  if (lo >= hi) return null
  const mid = (lo + hi) >>> 1
  const node = createNode(runs[mid]!)
  node.left = buildBalanced(runs, lo, mid)
  node.right = buildBalanced(runs, mid + 1, hi)
  update(node)
  setParent(node)
  return node
}

/** 全ランを配列として取得（in-order走査） */
function toArrayNodes<T>(root: RunNode<T> | null, result: Run<T>[]): void {
  if (root === null) return
  toArrayNodes(root.left, result)
  result.push(root.run)
  toArrayNodes(root.right, result)
}

/**
 * in-order の次ノード。最後のノードなら null。
 * 右サブツリーがあればその最小、なければ左の子として登ってきた最初の祖先。
 */
export function nextNode<T>(node: RunNode<T>): RunNode<T> | null {
  if (node.right !== null) return minNode(node.right)

  let current = node
  let parent = node.parent
  while (parent !== null && current === parent.right) {
    current = parent
    parent = parent.parent
  }
  return parent
}

/**
 * ラン木
 *
 * 開始位置で一意。ラン同士の重なりや隣接は検査しない。
 */
export class RunTree<T> {
  /** @internal */
  _root: RunNode<T> | null = null
  private readonly compare: Comparator<T>

  constructor(compare: Comparator<T>) {
    this.compare = compare
  }

  /** ソート済み・開始位置が一意なラン配列から平衡木を構築 */
  static fromSorted<T>(runs: readonly Run<T>[], compare: Comparator<T>): RunTree<T> {
    const tree = new RunTree(compare)
    tree._root = buildBalanced(runs, 0, runs.length)
    return tree
  }

  /** ラン数 */
  get length(): number {
    return size(this._root)
  }

  /** ランを挿入。同じ開始位置のランが既にあれば例外 */
  insert(run: Run<T>): void {
    this._root = insertNode(this._root, createNode(run), this.compare)
    this._root.parent = null
  }

  /** 開始位置が start のランを削除。見つかれば true */
  remove(start: T): boolean {
    const before = this.length
    this._root = removeNode(this._root, start, this.compare)
    if (this._root) this._root.parent = null
    return this.length < before
  }

  /** 開始位置が key 以下で最大のノード */
  floor(key: T): RunNode<T> | null {
    let node = this._root
    let best: RunNode<T> | null = null
    while (node !== null) {
      if (this.compare(node.run[0], key) <= 0) {
        best = node
        node = node.right
      } else {
        node = node.left
      }
    }
    return best
  }

  /** 開始位置が key 以上で最小のノード */
  ceiling(key: T): RunNode<T> | null {
    let node = this._root
    let best: RunNode<T> | null = null
    while (node !== null) {
      if (this.compare(node.run[0], key) >= 0) {
        best = node
        node = node.left
      } else {
        node = node.right
      }
    }
    return best
  }

  /** 全ランを削除 */
  clear(): void {
    this._root = null
  }

  /** 全ランを配列として取得 */
  toArray(): Run<T>[] {
    const result: Run<T>[] = []
    toArrayNodes(this._root, result)
    return result
  }
}
