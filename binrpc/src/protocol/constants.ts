/*
 Kamailio binrpc wire constants.

 HEADER:
   | 4 bits | 4 bits  | 4 bits | 2b | 2b | LL+1 bytes     | CL+1 bytes |
   | magic  | version | flags  | LL | CL | payload length | cookie     |

 RECORD (one per value):
   | 1 bit     | 3 bits | 4 bits | optional       | body  |
   | size flag | size   | type   | body length    |       |

   size flag 0: size is the body length itself (0..8)
   size flag 1: size is the byte width of the explicit body length field
*/

export const BINRPC_MAGIC = 0xa;
export const BINRPC_VERSION = 0x1;
export const BINRPC_MAGIC_VERSION = (BINRPC_MAGIC << 4) | BINRPC_VERSION; // 0xA1

// flags nibble in header byte1; nothing defined yet
export const BINRPC_FLAGS_NONE = 0x0;

export enum BinRpcType {
  Int = 0x0,
  String = 0x1, // NUL-terminated
  Double = 0x2,
  Struct = 0x3,
  Array = 0x4,
  Avp = 0x5,
  Bytes = 0x6, // no terminator
  All = 0xf, // wildcard, matches any record
}

export const COOKIE_BYTES = 4;
export const INT_BYTES = 4;
// largest body length that fits the 3-bit size subfield
export const MAX_INLINE_SIZE = 8;
// widest length field we emit (header LL and record explicit length)
export const MAX_LENGTH_BYTES = 4;
export const MAX_LENGTH = 0xffffffff;

// Kamailio carries doubles as int(value * 1000)
export const DOUBLE_SCALE = 1000;

export const DEFAULT_BINRPC_PORT = 2049;
