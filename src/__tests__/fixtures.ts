const ENTRY_KEY = Buffer.from('7AVFU8PP', 'latin1');

/**
 * Encode one plain `WORD=details` entry the way SuperDic files store it.
 */
export function encodeEntry(entry: string): string {
    const bytes = Buffer.from(entry, 'utf8');
    for (let i = 0; i < bytes.length; i++) {
        bytes[i] = (bytes[i] ?? 0) ^ (ENTRY_KEY[i % ENTRY_KEY.length] ?? 0);
    }
    return bytes.toString('base64');
}

/**
 * Build a SuperDic file with a small header and the given plain entries.
 */
export function buildSuperDic(entries: string[]): Buffer {
    const header = '[Header]\r\nLanguage=Test\r\nAuthor=Test Suite\r\n';
    const body = entries.map((entry) => (entry === '' ? '' : encodeEntry(entry))).join('\r\n');
    return Buffer.from(`${header}[Words]\r\n${body}\r\n`, 'latin1');
}

/**
 * Minimal fetch response for `vi.stubGlobal('fetch', ...)`.
 */
export function fakeResponse(
    body: Buffer,
    init: { status?: number; statusText?: string; headers?: Record<string, string> } = {}
): {
    ok: boolean;
    status: number;
    statusText: string;
    headers: Headers;
    arrayBuffer: () => Promise<ArrayBufferLike>;
} {
    const status = init.status ?? 200;
    return {
        ok: status >= 200 && status < 300,
        status,
        statusText: init.statusText ?? 'OK',
        headers: new Headers(init.headers),
        arrayBuffer: async () => new Uint8Array(body).buffer,
    };
}
