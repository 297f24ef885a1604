const isABufferReference = ({ buffer }: { buffer: unknown }): boolean => {
  if (buffer === null) {
    return false;
  }

  return typeof buffer === "object" || typeof buffer === "function";
};

const assertIsABufferReference = ({ buffer }: { buffer: unknown }): void => {
  if (!isABufferReference({ buffer })) {
    throw Error(`invalid buffer ${String(buffer)}, expected an object reference`);
  }
};

export {
  isABufferReference,
  assertIsABufferReference
};
