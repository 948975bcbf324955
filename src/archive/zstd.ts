import { ZstdCodec, type ZstdModule } from 'zstd-codec';
import { ArchiveError } from '../errors.js';

let zstdInstance: ZstdModule | null = null;

async function getZstd(): Promise<ZstdModule> {
    if (zstdInstance) return zstdInstance;
    return new Promise((resolve) => {
        ZstdCodec.run((zstd) => {
            zstdInstance = zstd;
            resolve(zstd);
        });
    });
}

export async function zstdCompress(data: Uint8Array, level: number = 3): Promise<Uint8Array> {
    const zstd = await getZstd();
    const compressed = new zstd.Simple().compress(data, level);
    if (!compressed) throw new ArchiveError('Zstd compression failed');
    return compressed;
}

export async function zstdDecompress(data: Uint8Array, maxSize?: number): Promise<Uint8Array> {
    const zstd = await getZstd();
    const decompressed = new zstd.Simple().decompress(data);
    if (!decompressed) throw new ArchiveError('Zstd decompression failed');

    if (maxSize !== undefined && decompressed.length > maxSize) {
        throw new ArchiveError(`Decompressed size limit exceeded (${decompressed.length} > ${maxSize})`);
    }
    return decompressed;
}
