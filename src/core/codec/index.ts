// src/core/codec/index.ts
export { CodecError, type Encoder, type Decoder } from "./codec";
export { TapeEncoder, TapeDecoder, encodeToTape, decodeFromTape, type TapeCell } from "./tape";
