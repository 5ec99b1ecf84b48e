/** Float rendering that always keeps a fractional part (`2.0`, `1.5`, `1e+21`). */
export function formatFloat(value: number): string {
  const rendered = String(value);
  if (!Number.isFinite(value) || /[.eE]/.test(rendered)) return rendered;
  return `${rendered}.0`;
}
