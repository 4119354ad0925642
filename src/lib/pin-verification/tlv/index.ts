export { decodeTLV, encodeTLV, type TLVItem } from './tlv-codec.js';
