export type Packet =
  | { type: 'data'; data: string }
  | { type: 'flush' }
  | { type: 'delim' }
  | { type: 'response-end' };

export type DecodeResult = {
  packets: Packet[];
  /** Bytes left over after the last complete packet. */
  remaining: Buffer;
};

export type AdvertisedRef = {
  oid: string;
  name: string;
};
