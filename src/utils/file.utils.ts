/**
 * File Utilities
 */

import fs from "node:fs";
import path from "node:path";
import iconv from 'iconv-lite';
import { CHAT_FILE_EXTENSIONS, DEFAULT_ENCODING } from './constants';
import { InvalidArgumentError, UnreadableInputError } from './errors';

// ============================================================================
// DECODING
// ============================================================================

/**
 * Decodes raw file bytes into transcript text. A leading BOM is dropped.
 * Binary content and bytes that do not survive a decode/encode round trip in
 * the chosen encoding are rejected. A U+FFFD stored in the file itself is text.
 */
export function decodeChatBuffer(buffer: Buffer, fileName: string, encoding: string = DEFAULT_ENCODING): string {
    if (!iconv.encodingExists(encoding)) {
        throw new InvalidArgumentError(`Unknown text encoding: ${encoding}`);
    }

    const decoded = iconv.decode(buffer, encoding, { stripBOM: false });

    if (decoded.includes('\u0000')) {
        throw new UnreadableInputError(`${fileName} looks like a binary file`, fileName);
    }
    if (!iconv.encode(decoded, encoding, { addBOM: false }).equals(buffer)) {
        throw new UnreadableInputError(`${fileName} is not valid ${encoding} text`, fileName);
    }

    return decoded.startsWith('\uFEFF') ? decoded.slice(1) : decoded;
}

// ============================================================================
// FILE DISCOVERY
// ============================================================================

/**
 * Finds files with one of the given extensions in a directory, recursively, sorted by path
 */
export function discoverFiles(directoryPath: string, extensions: readonly string[]): string[] {
    const found: string[] = [];

    function scanDirectory(dir: string) {
        const items = fs.readdirSync(dir, { withFileTypes: true });

        for (const item of items) {
            const fullPath = path.join(dir, item.name);

            if (item.isDirectory()) {
                scanDirectory(fullPath);
            } else if (item.isFile() && extensions.includes(path.extname(item.name).toLowerCase())) {
                found.push(fullPath);
            }
        }
    }

    scanDirectory(directoryPath);
    return found.sort();
}

export function discoverChatFiles(directoryPath: string): string[] {
    return discoverFiles(directoryPath, CHAT_FILE_EXTENSIONS);
}

/**
 * Expands a mix of file and directory paths into file paths.
 * Explicit files keep their position; directories expand in place.
 */
export function resolveInputPaths(inputPaths: readonly string[], extensions: readonly string[]): string[] {
    return inputPaths.flatMap(inputPath => {
        const resolved = path.resolve(inputPath);
        if (!fs.existsSync(resolved)) {
            throw new InvalidArgumentError(`Path does not exist: ${resolved}`);
        }
        return fs.statSync(resolved).isDirectory() ? discoverFiles(resolved, extensions) : [resolved];
    });
}

export function resolveChatPaths(inputPaths: readonly string[]): string[] {
    return resolveInputPaths(inputPaths, CHAT_FILE_EXTENSIONS);
}
