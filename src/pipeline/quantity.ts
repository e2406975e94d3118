const numericToken = /\d+(?:\.\d+)?/;

function formatScaled(value: number): string {
  if (Number.isInteger(value)) {
    return String(value);
  }
  return value
    .toFixed(2)
    .replace(/0+$/, "")
    .replace(/\.$/, "");
}

/**
 * Rescales the first number in a free-form quantity such as "2.5 cups sugar",
 * leaving the rest of the text alone. Fractions are not understood: in "1/2 cup"
 * only the leading "1" is scaled. Text without a number ("a pinch of salt") is
 * returned as is.
 */
export function scaleQuantity(quantityText: string, factor: number): string {
  const match = numericToken.exec(quantityText);
  if (!match) {
    return quantityText;
  }

  const scaled = Number(match[0]) * factor;
  if (!Number.isFinite(scaled)) {
    return quantityText;
  }

  const start = match.index;
  const end = start + match[0].length;
  return `${quantityText.slice(0, start)}${formatScaled(scaled)}${quantityText.slice(end)}`;
}
