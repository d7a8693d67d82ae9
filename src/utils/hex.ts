export const hex = (v: number, digits: number): string => (v >>> 0).toString(16).toUpperCase().padStart(digits, '0');
export const hex2 = (v: number): string => hex(v & 0xFF, 2);
export const hex3 = (v: number): string => hex(v & 0xFFF, 3);
export const hex4 = (v: number): string => hex(v & 0xFFFF, 4);
