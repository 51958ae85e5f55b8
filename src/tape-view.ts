const pad3 = (n: number): string => String(n).padStart(3, '0');

/**
 * Render the tape as four rows: pointer marker, index, decimal value and the
 * printable character of each cell. Shows every cell up to the last non-zero
 * one or the pointer, whichever is further right.
 */
export const renderTape = (cells: readonly number[], cc: number): string => {
    if (cells.length === 0) {
        return '';
    }

    let lastNonZero = 0;
    cells.forEach((value, i) => {
        if (value !== 0) lastNonZero = i;
    });
    const last = Math.min(Math.max(lastNonZero, cc), cells.length - 1);

    let ptrRow = '  ';
    let indexRow = 'i ';
    let rawRow = 'd ';
    let asciiRow = 'a ';

    for (let i = 0; i <= last; i++) {
        const value = cells[i];
        ptrRow += i === cc ? '   V  ' : '      ';
        indexRow += `| ${pad3(i)} `;
        rawRow += `| ${pad3(value)} `;
        asciiRow += `|  ${value >= 32 && value < 127 ? String.fromCharCode(value) : ' '}  `;
    }

    return `${ptrRow}\n${indexRow}|\n${rawRow}|\n${asciiRow}|\n`;
};
