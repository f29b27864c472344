export type ColorStop = {
  value: number;
  color: string;
};

// Link utilisation, dark blue at idle through to red when saturated.
export const DEFAULT_COLOR_SCALE: readonly ColorStop[] = [
  { value: 0, color: "#1d4877" },
  { value: 0.1, color: "#1b8a5a" },
  { value: 0.5, color: "#fbb021" },
  { value: 0.7, color: "#f68838" },
  { value: 0.9, color: "#ee3e32" },
];

type Rgb = [number, number, number];

// "#rrggbb" or "#rgb".
export function parseColor(raw: string): Rgb | undefined {
  const m = /^#([0-9a-f]{3}|[0-9a-f]{6})$/i.exec(raw.trim());
  if (!m) return undefined;
  let hex = m[1];
  if (hex.length === 3) hex = hex.replace(/./g, (c) => c + c);
  return [parseInt(hex.slice(0, 2), 16), parseInt(hex.slice(2, 4), 16), parseInt(hex.slice(4, 6), 16)];
}

export function formatColor(rgb: Rgb): string {
  return "#" + rgb.map((c) => Math.round(c).toString(16).padStart(2, "0")).join("");
}

export function sortStops(stops: readonly ColorStop[]): ColorStop[] {
  return stops.slice().sort((a, b) => a.value - b.value);
}

/**
 * Colour for `v` on a scale of stops sorted by value. Values outside the scale take the
 * colour of the nearest end; values in between mix the RGB channels of the two stops
 * around them.
 */
export function colorAt(stops: readonly ColorStop[], v: number): string | undefined {
  if (stops.length === 0) return undefined;
  const first = stops[0];
  const last = stops[stops.length - 1];
  if (v <= first.value) return first.color;
  if (v >= last.value) return last.color;

  for (let i = 0; i + 1 < stops.length; i += 1) {
    const lo = stops[i];
    const hi = stops[i + 1];
    if (v > hi.value) continue;
    const a = parseColor(lo.color);
    const b = parseColor(hi.color);
    if (!a || !b || hi.value === lo.value) return lo.color;
    const t = (v - lo.value) / (hi.value - lo.value);
    return formatColor([a[0] + (b[0] - a[0]) * t, a[1] + (b[1] - a[1]) * t, a[2] + (b[2] - a[2]) * t]);
  }
  return last.color;
}
