/** RunList の全エラーの基底クラス */
export class RunListError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/** start >= end の範囲が渡された */
export class InvalidRangeError extends RunListError {
  readonly start: unknown
  readonly end: unknown

  constructor(start: unknown, end: unknown) {
    super(`無効な範囲: [${String(start)}, ${String(end)})`)
    this.start = start
    this.end = end
  }
}

/** 異なるドメインの RunList 同士を演算しようとした */
export class DomainMismatchError extends RunListError {
  constructor() {
    super('ドメインが一致しない RunList 同士は演算できません')
  }
}
