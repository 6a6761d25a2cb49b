/**
 * Shape of a TypeScript enum object at runtime.
 *
 * A numeric enum compiles to a two-way lookup: `Mode.Fast === 1` and
 * `Mode[1] === 'Fast'`.
 */
export type EnumObject = Record<string, string | number>;

/**
 * A member of a named enumeration type.
 *
 * `name` is absent when `value` matches no single member, which is how flag
 * combinations (`Read | Write`) show up.
 */
export class Enumeration {
  readonly typeName: string;
  readonly value: number;
  readonly name: string | undefined;

  constructor(typeName: string, value: number, name?: string) {
    this.typeName = typeName;
    this.value = value;
    this.name = name;
  }

  /**
   * Looks `value` up in a numeric TypeScript enum.
   *
   * @example
   *   enum Mode { Slow = 0, Fast = 1 }
   *   Enumeration.of(Mode, Mode.Fast, 'Mode'); // name 'Fast'
   *   Enumeration.of(Mode, 3, 'Mode');         // name undefined
   */
  static of(enumObject: EnumObject, value: number, typeName: string): Enumeration {
    const reverse = enumObject[String(value)];
    const name =
      typeof reverse === 'string' && enumObject[reverse] === value
        ? reverse
        : undefined;
    return new Enumeration(typeName, value, name);
  }
}
