// ===== 基本型 =====

/** ラン: 半開区間 [start, end)。start < end を常に満たす */
export type Run<T> = readonly [start: T, end: T]

/** 比較関数（負値 = a が小さい、0 = 等しい、正値 = a が大きい） */
export type Comparator<T> = (a: T, b: T) => number

// ===== ドメイン =====

/**
 * ランを置く順序付き離散ドメイン
 *
 * compare は全順序でなければならない。
 * next は1点だけのラン [key, next(key)) を作るための後続値。
 */
export interface Domain<T> {
  /** 2値の比較 */
  compare: Comparator<T>
  /** 後続値 */
  next(value: T): T
}
