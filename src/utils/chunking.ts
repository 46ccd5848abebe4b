/**
 * Split text into chunks of at most `maxChars` characters.
 *
 * Words are packed greedily and joined by a single space; a single word longer
 * than the bound is cut into pieces of at most `maxChars` UTF-16 units, never
 * between the halves of a surrogate pair unless `maxChars` is 1. Blank input
 * yields no chunks.
 */
export function chunkText(text: string, maxChars: number): string[] {
    if (!Number.isInteger(maxChars) || maxChars < 1) {
        throw new RangeError(`maxChars must be a positive integer, got ${maxChars}`);
    }

    const words = text.split(/\s+/).filter(word => word.length > 0);
    const chunks: string[] = [];
    let current = '';

    const flush = () => {
        if (current.length > 0) {
            chunks.push(current);
            current = '';
        }
    };

    for (const word of words) {
        if (word.length > maxChars) {
            flush();
            let start = 0;
            while (start < word.length) {
                let end = Math.min(start + maxChars, word.length);
                if (end < word.length && end - 1 > start && isHighSurrogate(word.charCodeAt(end - 1))) {
                    end -= 1;
                }
                chunks.push(word.slice(start, end));
                start = end;
            }
            continue;
        }

        if (current.length === 0) {
            current = word;
        } else if (current.length + 1 + word.length <= maxChars) {
            current = `${current} ${word}`;
        } else {
            flush();
            current = word;
        }
    }
    flush();

    return chunks;
}

function isHighSurrogate(code: number): boolean {
    return code >= 0xd800 && code <= 0xdbff;
}
