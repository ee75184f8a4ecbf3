/**
 * Splits a continuous `image2pipe` PNG byte stream into whole PNG images.
 * Walks the chunk layout (length, type, data, crc) and cuts after each IEND,
 * so images may arrive split across any number of reads.
 */

export const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

// Anything larger is a corrupt length field, not a real chunk
const MAX_CHUNK_LENGTH = 64 * 1024 * 1024;

export class PngStreamSplitter {
    private pending: Buffer = Buffer.alloc(0);
    // Offset of the next unparsed chunk header inside `pending`, 0 = still looking for a signature
    private offset = 0;
    private discarded = 0;

    constructor(private readonly onImage: (png: Buffer) => void) {}

    /** Bytes thrown away while resynchronising on a signature since the last reset */
    get discardedBytes(): number {
        return this.discarded;
    }

    push(chunk: Buffer): void {
        this.pending = this.pending.length === 0 ? chunk : Buffer.concat([this.pending, chunk]);

        for (;;) {
            if (this.offset === 0 && !this.alignToSignature()) return;

            if (this.pending.length < this.offset + 8) return;
            const length = this.pending.readUInt32BE(this.offset);
            if (length > MAX_CHUNK_LENGTH) {
                this.resync();
                continue;
            }
            const end = this.offset + 12 + length;
            if (this.pending.length < end) return;

            const type = this.pending.toString('latin1', this.offset + 4, this.offset + 8);
            this.offset = end;

            if (type === 'IEND') {
                // Copy so the emitted image does not pin the accumulation buffer
                this.onImage(Buffer.from(this.pending.subarray(0, end)));
                this.pending = this.pending.subarray(end);
                this.offset = 0;
            }
        }
    }

    reset(): void {
        this.pending = Buffer.alloc(0);
        this.offset = 0;
        this.discarded = 0;
    }

    private alignToSignature(): boolean {
        const start = this.pending.indexOf(PNG_SIGNATURE);
        if (start === -1) {
            // Keep a tail that could be the beginning of a split signature
            const keep = Math.min(this.pending.length, PNG_SIGNATURE.length - 1);
            this.discarded += this.pending.length - keep;
            this.pending = this.pending.subarray(this.pending.length - keep);
            return false;
        }
        this.discarded += start;
        this.pending = this.pending.subarray(start);
        this.offset = PNG_SIGNATURE.length;
        return true;
    }

    private resync(): void {
        this.discarded += 1;
        this.pending = this.pending.subarray(1);
        this.offset = 0;
    }
}
