export type ParsedAddress = {
  readonly type: string;
  readonly name: string;
  readonly index?: number;
};

const ADDRESS_PATTERN = /^([A-Za-z_][\w-]*)\.([A-Za-z_][\w-]*)(?:\[(\d+)\])?$/;

export const formatAddress = (type: string, name: string, index?: number): string =>
  index === undefined ? `${type}.${name}` : `${type}.${name}[${index}]`;

export const parseAddress = (address: string): ParsedAddress | null => {
  const match = ADDRESS_PATTERN.exec(address);
  if (match === null) {
    return null;
  }
  const [, type = "", name = "", index] = match;
  return index === undefined ? { type, name } : { type, name, index: parseInt(index, 10) };
};

/** `aws_subnet.private[2]` -> `aws_subnet.private` */
export const resourceOf = (address: string): string => {
  const bracket = address.indexOf("[");
  return bracket === -1 ? address : address.slice(0, bracket);
};

export const indexOf = (address: string): number | undefined => parseAddress(address)?.index;

/** Orders by resource, then numerically by index, so `a[2]` sorts before `a[10]`. */
export const compareAddresses = (a: string, b: string): number => {
  const ra = resourceOf(a);
  const rb = resourceOf(b);
  if (ra !== rb) {
    return ra < rb ? -1 : 1;
  }
  const ia = indexOf(a) ?? -1;
  const ib = indexOf(b) ?? -1;
  return ia - ib;
};

export const sortAddresses = (addresses: Iterable<string>): string[] =>
  Array.from(addresses).sort(compareAddresses);
