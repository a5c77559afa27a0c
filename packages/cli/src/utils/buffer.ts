/**
 * Copies file contents into a standalone ArrayBuffer for the core parsers.
 */
export function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
    const data = new ArrayBuffer(bytes.byteLength);
    new Uint8Array(data).set(bytes);
    return data;
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
