import units from "./units.json";

// Citation markers and sub/superscripts carry digits that are not measurements
const NON_QUANTITY_PATTERN = /\[\d+(?:\s*[-–,]\s*\d+)*\]|[_^]\{[^}]*\}/g;

/** Integer, decimal or scientific notation not glued to a preceding letter (LiFePO4) */
const NUMBER_SOURCE = String.raw`(?<![\p{L}_])\d+(?:[.,]\d+)?(?:[eE][+-]?\d+|\s*[×x]\s*10\^?[⁻⁺-]?\d+)?`;

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}

// Longest first so "mAh/g" wins over "mAh" and "m"
const UNIT_SOURCE = [...units]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join("|");

const NUMBER_PATTERN = new RegExp(NUMBER_SOURCE, "u");
const QUANTITY_PATTERN = new RegExp(`${NUMBER_SOURCE}\\s?(?:${UNIT_SOURCE})(?![\\p{L}\\p{N}])`, "u");

function measurable(text: string): string {
    return text.replace(NON_QUANTITY_PATTERN, " ");
}

/**
 * Whether the text states a number, ignoring citation markers and formula indices
 */
export function hasNumber(text: string): boolean {
    return NUMBER_PATTERN.test(measurable(text));
}

/**
 * Whether the text states a number followed by a measurement unit (`4.2 V`, `700 °C`, `160 mAh/g`)
 */
export function hasUnit(text: string): boolean {
    return QUANTITY_PATTERN.test(measurable(text));
}
