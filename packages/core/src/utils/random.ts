/**
 * 可注入的随机源
 *
 * 出题、洗牌、干扰项抽取全部经过 RandomSource，测试中可替换为确定性实现
 */

export interface RandomSource {
  /** 返回 [0,1) 的浮点数 */
  next(): number;
}

export const mathRandom: RandomSource = {
  next: () => Math.random(),
};

/**
 * mulberry32 伪随机数生成器，同一种子产生相同序列
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return {
    next() {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/** [0, max) 内的均匀整数 */
export function randomInt(rng: RandomSource, max: number): number {
  return Math.floor(rng.next() * max);
}

/** Fisher-Yates shuffle (unbiased)，返回新数组 */
export function shuffle<T>(rng: RandomSource, arr: readonly T[]): T[] {
  const a = [...arr];
  for (let i = a.length - 1; i > 0; i--) {
    const j = randomInt(rng, i + 1);
    [a[i], a[j]] = [a[j], a[i]];
  }
  return a;
}

export function pickOne<T>(rng: RandomSource, arr: readonly T[]): T | undefined {
  if (arr.length === 0) return undefined;
  return arr[randomInt(rng, arr.length)];
}
