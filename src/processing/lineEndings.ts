const BR_TAG = /^<br\s*\/?>/i;

export interface NormalizedLines {
    text: string;
    /** Original break for each `\n` in `text`, in order */
    endings: string[];
}

/**
 * Replace every line break (`\r\n`, `\r`, `\n` and HTML `<br>` variants) with `\n`,
 * remembering which break stood at each position.
 */
export function normalizeLineEndings(text: string): NormalizedLines {
    if (!/[\r\n]/.test(text) && !text.toLowerCase().includes('<br')) {
        return { text, endings: [] };
    }

    const endings: string[] = [];
    let normalized = '';
    let i = 0;

    while (i < text.length) {
        const br = text[i] === '<' ? BR_TAG.exec(text.slice(i)) : null;
        if (br) {
            endings.push(br[0]);
            normalized += '\n';
            i += br[0].length;
            continue;
        }

        if (text.startsWith('\r\n', i)) {
            endings.push('\r\n');
            normalized += '\n';
            i += 2;
        } else if (text[i] === '\r' || text[i] === '\n') {
            endings.push(text[i]);
            normalized += '\n';
            i += 1;
        } else {
            normalized += text[i];
            i += 1;
        }
    }

    return { text: normalized, endings };
}

/**
 * Put the recorded breaks back. Extra lines fall back to `\n`.
 */
export function restoreLineEndings(text: string, endings: string[]): string {
    if (endings.length === 0) {
        return text;
    }

    const lines = text.split('\n');
    let result = lines[0];
    for (let i = 1; i < lines.length; i++) {
        result += (endings[i - 1] ?? '\n') + lines[i];
    }
    return result;
}
