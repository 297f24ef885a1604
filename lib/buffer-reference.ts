/* c8 ignore start */
type TBufferReference<TBuffer extends object> = {
  deref: () => TBuffer | undefined;
};

type TBufferReferenceFactory = {
  createReference: <TBuffer extends object>(args: { buffer: TBuffer }) => TBufferReference<TBuffer>;
};

export type {
  TBufferReference,
  TBufferReferenceFactory
};
/* c8 ignore end */
