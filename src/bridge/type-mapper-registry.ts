import type { Datapoint, DomainValue, RawPayload, TypeMapper } from './types';

/**
 * Ordered list of type mappers. The first mapper returning a non-null
 * result wins; when mappers overlap, which one answers depends on
 * registration order. A null result from every mapper means the
 * conversion is unsupported and is not an error.
 */
export class TypeMapperRegistry {
  private readonly mappers: TypeMapper[] = [];

  add(mapper: TypeMapper): boolean {
    if (this.mappers.includes(mapper)) {
      return false;
    }
    this.mappers.push(mapper);
    return true;
  }

  remove(mapper: TypeMapper): boolean {
    const index = this.mappers.indexOf(mapper);
    if (index === -1) {
      return false;
    }
    this.mappers.splice(index, 1);
    return true;
  }

  size(): number {
    return this.mappers.length;
  }

  toDomainValue(datapoint: Datapoint, payload: RawPayload): DomainValue | null {
    for (const mapper of this.mappers) {
      const value = mapper.toDomainValue(datapoint, payload);
      if (value !== null) {
        return value;
      }
    }
    return null;
  }

  toRawValue(value: DomainValue): RawPayload | null {
    for (const mapper of this.mappers) {
      const raw = mapper.toRawValue(value);
      if (raw !== null) {
        return raw;
      }
    }
    return null;
  }
}
