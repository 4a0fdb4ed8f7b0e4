/**
 * ブロック割り当てマップのデモストーリー
 *
 * 使用中ブロックを RunList で管理し、反転で空きブロックの表示に切り替える。
 */

import type { Meta, StoryObj } from '@storybook/html-vite'
import { RunList } from '../src/run-list.js'
import { integerDomain } from '../src/domain.js'

/** 表示するブロック数 */
const BLOCK_COUNT = 256

// --- スタイル定義 ---

const STYLES = `
  .demo-container {
    font-family: system-ui, -apple-system, sans-serif;
    max-width: 900px;
    margin: 24px auto;
    padding: 24px;
  }
  .controls {
    display: flex;
    gap: 8px;
    align-items: center;
    margin-bottom: 16px;
  }
  .controls input {
    width: 72px;
    padding: 6px;
    font-family: monospace;
  }
  .controls button {
    padding: 6px 16px;
    background: #4a90d9;
    color: white;
    border: none;
    border-radius: 4px;
    cursor: pointer;
  }
  .controls button:hover { background: #357abd; }
  .block-grid {
    display: grid;
    grid-template-columns: repeat(32, 1fr);
    gap: 2px;
    margin-bottom: 16px;
  }
  .block {
    height: 18px;
    border-radius: 2px;
    background: #e0e0e0;
  }
  .block.on { background: #2d7d2d; }
  .block.on.inverted { background: #c77d1d; }
  .run-list {
    font-family: monospace;
    font-size: 13px;
    padding: 8px;
    background: #f0f0f0;
    border-radius: 4px;
  }
  .error {
    color: #c33;
    font-size: 13px;
    min-height: 18px;
  }
`

// --- ユーティリティ ---

/** 格納ランのテキスト表現 */
function formatRuns(list: RunList<number>): string {
  const runs = list.toArray()
  const body = runs.length === 0 ? '（ランなし）' : runs.map(([s, e]) => `[${s}, ${e})`).join(' ')
  return `${list.isInverted ? '反転 ' : ''}${body}`
}

// --- ストーリー定義 ---

interface DemoArgs {
  /** 初期状態で使用中にする範囲 */
  initial: [number, number][]
}

const meta: Meta<DemoArgs> = {
  title: 'ブロック割り当てマップ',
}

export default meta

type Story = StoryObj<DemoArgs>

/** デモUIを構築する共通関数 */
function createDemoUI(args: DemoArgs): HTMLElement {
  const container = document.createElement('div')

  // スタイル注入
  const style = document.createElement('style')
  style.textContent = STYLES
  container.appendChild(style)

  const wrapper = document.createElement('div')
  wrapper.className = 'demo-container'
  container.appendChild(wrapper)

  const list = RunList.from(integerDomain, args.initial)

  // 操作パネル
  const controls = document.createElement('div')
  controls.className = 'controls'
  wrapper.appendChild(controls)

  const startInput = document.createElement('input')
  startInput.type = 'number'
  startInput.value = '0'
  const endInput = document.createElement('input')
  endInput.type = 'number'
  endInput.value = '16'
  controls.append('開始', startInput, '終了', endInput)

  const error = document.createElement('div')
  error.className = 'error'

  const grid = document.createElement('div')
  grid.className = 'block-grid'
  const blocks: HTMLElement[] = []
  for (let i = 0; i < BLOCK_COUNT; i++) {
    const block = document.createElement('div')
    block.className = 'block'
    block.title = `#${i}`
    grid.appendChild(block)
    blocks.push(block)
  }

  const runsView = document.createElement('div')
  runsView.className = 'run-list'

  const render = () => {
    blocks.forEach((block, i) => {
      block.classList.toggle('on', list.inRun(i))
      block.classList.toggle('inverted', list.isInverted)
    })
    runsView.textContent = formatRuns(list)
  }

  /** 入力範囲に操作を適用し、無効な範囲ならメッセージを表示 */
  const apply = (op: (start: number, end: number) => void) => () => {
    try {
      op(Number(startInput.value), Number(endInput.value))
      error.textContent = ''
    } catch (err) {
      error.textContent = err instanceof Error ? err.message : String(err)
    }
    render()
  }

  const addButton = document.createElement('button')
  addButton.textContent = '割り当て'
  addButton.addEventListener('click', apply((s, e) => list.addRun(s, e)))

  const subButton = document.createElement('button')
  subButton.textContent = '解放'
  subButton.addEventListener('click', apply((s, e) => list.subRun(s, e)))

  const invertButton = document.createElement('button')
  invertButton.textContent = '使用中/空き 切替'
  invertButton.addEventListener('click', () => {
    list.invert()
    render()
  })

  controls.append(addButton, subButton, invertButton)
  wrapper.append(error, grid, runsView)

  render()
  return container
}

/** デフォルト: 空の状態から手動操作 */
export const Default: Story = {
  args: { initial: [] },
  render: (args) => createDemoUI(args),
}

/** 断片化した割り当て */
export const Fragmented: Story = {
  args: { initial: [[0, 12], [20, 24], [40, 90], [91, 100], [180, 256]] },
  render: (args) => createDemoUI(args),
}
