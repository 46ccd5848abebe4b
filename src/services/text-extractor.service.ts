export type BinaryDecoder = (bytes: Buffer) => Promise<string>;

// pdf-parse is loaded on first use
export const parsePdf: BinaryDecoder = async (bytes) => {
    const { default: pdf } = await import('pdf-parse');
    return (await pdf(bytes)).text;
};

export interface ITextExtractor {
    extract(filename: string, bytes: Buffer, contentType?: string): Promise<string>;
}

/**
 * Decodes uploaded files to plain text: PDFs through pdf-parse, anything else
 * as UTF-8.
 */
export class TextExtractorService implements ITextExtractor {
    constructor(
        private decodePdf: BinaryDecoder = parsePdf
    ) { }

    async extract(filename: string, bytes: Buffer, contentType?: string): Promise<string> {
        if (TextExtractorService.isPdf(filename, contentType)) {
            return this.decodePdf(bytes);
        }

        const text = bytes.toString('utf-8');
        if (text.includes('\u0000')) {
            throw new Error(`${filename} is not a text document`);
        }
        return text;
    }

    static isPdf(filename: string, contentType?: string): boolean {
        return contentType === 'application/pdf' || filename.toLowerCase().endsWith('.pdf');
    }
}
