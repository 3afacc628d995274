const currencyFormatter = new Intl.NumberFormat('en-US', {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
});

/** `1234.5` -> `$1,234.50`; negatives keep the sign before the symbol */
export function formatCurrency(amount: number): string {
    const formatted = currencyFormatter.format(Math.abs(amount));
    return amount < 0 ? `-$${formatted}` : `$${formatted}`;
}

/** `12.345` -> `12.35%` */
export function formatPercentage(value: number): string {
    return `${value.toFixed(2)}%`;
}

/** Rounds to cents for wire output */
export function roundTo(value: number, digits = 2): number {
    const factor = 10 ** digits;
    return Math.round(value * factor) / factor;
}
