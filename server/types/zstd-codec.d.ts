declare module 'zstd-codec' {
  export interface ZstdSimple {
    compress(data: Uint8Array, compressionLevel?: number): Uint8Array
    decompress(data: Uint8Array): Uint8Array
  }

  export interface ZstdBinding {
    Simple: new () => ZstdSimple
  }

  export const ZstdCodec: {
    run(callback: (zstd: ZstdBinding) => void): void
  }
}
