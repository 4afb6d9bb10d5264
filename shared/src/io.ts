import * as fs from 'fs';

/** Split text into trimmed, non-blank lines. */
export function toLines(text: string): string[] {
    return text.split(/\r?\n/).map((line) => line.trim()).filter(Boolean);
}

/** Read a stream to its end and return its non-blank lines. */
export async function readLines(stream: NodeJS.ReadableStream): Promise<string[]> {
    let text = '';
    for await (const chunk of stream) {
        text += chunk.toString();
    }
    return toLines(text);
}

/** Read a file's non-blank lines. Throws when the file cannot be read. */
export function readFileLines(filePath: string): string[] {
    return toLines(fs.readFileSync(filePath, 'utf8'));
}
