/** Badge colors for item rows, picked by the first code point of the name. */
export const ROW_PALETTE: readonly string[] = [
  '#FF6B6B',
  '#4ECDC4',
  '#45B7D1',
  '#FFA07A',
  '#98D8C8',
  '#F7DC6F',
  '#BB8FCE',
  '#85C1E2',
  '#F8B88B',
  '#52B788'
];

export const ACCENT_COLOR = '#44C0FF';

export function colorForName(name: string): string {
  const codePoint = name.codePointAt(0) ?? 0;
  return ROW_PALETTE[codePoint % ROW_PALETTE.length];
}
