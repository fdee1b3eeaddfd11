export function between(x: number, lo: number, hi: number): boolean {
  return x >= lo && x <= hi;
}
