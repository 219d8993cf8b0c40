/**
 * 指标快照：某一时刻某个 campaign 的累计值，写入后不再修改，保留 4 小时
 */
export interface SnapshotReading {
  spent: number
  cart: number    // 累计加购数
  clicks: number
  orders: number
  sales: number
}

export interface Snapshot extends SnapshotReading {
  t: number       // epoch ms
}
