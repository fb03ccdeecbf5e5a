type PricedLine = { quantity: number; unitPrice: number };

export function lineSubtotal(line: PricedLine) {
  return line.quantity * line.unitPrice;
}

export function calculateTotal(lines: PricedLine[]) {
  return lines.reduce((acc, line) => acc + lineSubtotal(line), 0);
}
