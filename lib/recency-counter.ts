type TRecencyCounter = {
  next: () => bigint;
  peek: () => bigint;
};

// 0n is reserved for slots that were never used
const createRecencyCounter = ({
  initialValue = 1n
}: {
  initialValue?: bigint
} = {}): TRecencyCounter => {

  if (initialValue <= 0n) {
    throw Error(`invalid recency counter initial value ${initialValue}, must be greater than 0`);
  }

  let value = initialValue;

  const next = () => {
    const issued = value;
    value += 1n;
    return issued;
  };

  const peek = () => {
    return value;
  };

  return {
    next,
    peek
  };
};

export {
  createRecencyCounter
};

export type {
  TRecencyCounter
};
