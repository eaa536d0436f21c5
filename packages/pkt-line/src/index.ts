import type { AdvertisedRef, DecodeResult, Packet } from './types';

/** Ends a protocol section. */
export const FLUSH_PKT = '0000';

/** Separates a protocol-v2 command line from its arguments. */
export const DELIM_PKT = '0001';

/** Marks the end of a stateless protocol-v2 response. */
export const RESPONSE_END_PKT = '0002';

/** Largest length a single pkt-line may declare, header included. */
export const MAX_PKT_LINE_LENGTH = 65520;

/**
 * Object id sent as the `want` of a fetch when no real ref is known. The
 * proxy can never satisfy it, so a fetch with it always takes the miss path.
 */
export const PLACEHOLDER_WANT_REF = '0'.repeat(40);

const HEX_OID = /^(?:[0-9a-f]{40}|[0-9a-f]{64})$/;

/**
 * Frame one line as a pkt-line: a 4-digit lowercase hex length counting the
 * header itself, followed by the content.
 *
 * @example
 * encodePktLine('peel\n'); // '0009peel\n'
 */
export const encodePktLine = (line: string): string => {
  const length = Buffer.byteLength(line, 'utf8') + 4;
  return length.toString(16).padStart(4, '0') + line;
};

export const encodeLsRefs = (): string => {
  return (
    encodePktLine('command=ls-refs\n') +
    DELIM_PKT +
    encodePktLine('peel\n') +
    encodePktLine('symrefs\n') +
    encodePktLine('unborn\n') +
    encodePktLine('ref-prefix refs/\n') +
    FLUSH_PKT
  );
};

/**
 * Build a protocol-v2 fetch request for a single want. The want is not
 * validated; its byte length only changes the computed prefix.
 */
export const encodeFetch = (wantRef: string): string => {
  return (
    encodePktLine('command=fetch\n') +
    DELIM_PKT +
    encodePktLine('thin-pack\n') +
    encodePktLine('ofs-delta\n') +
    encodePktLine(`want ${wantRef}\n`) +
    FLUSH_PKT +
    encodePktLine('done\n') +
    FLUSH_PKT
  );
};

const specialPacket = (length: number): Packet | null => {
  switch (length) {
    case 0:
      return { type: 'flush' };
    case 1:
      return { type: 'delim' };
    case 2:
      return { type: 'response-end' };
    default:
      return null;
  }
};

/**
 * Split a response body into packets. Parsing stops at the first packet that
 * is truncated or carries an invalid header; everything from there on is
 * returned as `remaining`.
 */
export const decodePktLines = (payload: Buffer | string): DecodeResult => {
  const buffer = typeof payload === 'string' ? Buffer.from(payload, 'utf8') : payload;
  const packets: Packet[] = [];
  let offset = 0;

  while (buffer.length - offset >= 4) {
    const header = buffer.toString('latin1', offset, offset + 4);
    if (!/^[0-9a-f]{4}$/i.test(header)) {
      break;
    }
    const length = Number.parseInt(header, 16);
    const special = specialPacket(length);
    if (special) {
      packets.push(special);
      offset += 4;
      continue;
    }
    if (length < 4 || length > MAX_PKT_LINE_LENGTH || buffer.length - offset < length) {
      break;
    }
    packets.push({ type: 'data', data: buffer.toString('utf8', offset + 4, offset + length) });
    offset += length;
  }

  return { packets, remaining: buffer.subarray(offset) };
};

/** Extract `<oid> <refname>` entries from an ls-refs response body. */
export const parseRefAdvertisement = (payload: Buffer | string): AdvertisedRef[] => {
  const refs: AdvertisedRef[] = [];
  for (const packet of decodePktLines(payload).packets) {
    if (packet.type !== 'data') {
      continue;
    }
    const [oid, name] = packet.data.replace(/\n$/, '').split(' ');
    if (oid && name && HEX_OID.test(oid)) {
      refs.push({ oid, name });
    }
  }
  return refs;
};

export type { AdvertisedRef, DecodeResult, Packet } from './types';
