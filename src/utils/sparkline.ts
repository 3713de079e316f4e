const BARS = "▁▂▃▄▅▆▇█";

export function createSparkline(values: readonly number[], width = 24): string {
  if (width <= 0) return "";
  if (values.length === 0) return " ".repeat(width);

  const points = values.length <= width ? [...values] : bucketAverages(values, width);
  const min = Math.min(...points);
  const max = Math.max(...points);
  const range = max - min;

  const bars = points.map((value) => {
    if (range === 0) return BARS[3] ?? "";
    const idx = Math.min(BARS.length - 1, Math.floor(((value - min) / range) * BARS.length));
    return BARS[idx] ?? "";
  });
  return bars.join("").padStart(width, " ");
}

function bucketAverages(values: readonly number[], buckets: number): number[] {
  const out: number[] = [];
  for (let b = 0; b < buckets; b++) {
    const from = Math.floor((b * values.length) / buckets);
    const to = Math.floor(((b + 1) * values.length) / buckets);
    let total = 0;
    for (let i = from; i < to; i++) total += values[i] ?? 0;
    out.push(total / Math.max(1, to - from));
  }
  return out;
}
