/** biome-ignore-all lint/complexity/noStaticOnlyClass: utility class */

import { StreamDecodeError } from "#src/parser/errors";
import type { Filter, FilterSpec } from "./filter";
import { FlateFilter } from "./flate-filter";

/**
 * Registry and executor for stream filters.
 *
 * When a stream has multiple filters they are applied in sequence: the
 * first filter's output becomes the second filter's input.
 *
 * Only FlateDecode is registered out of the box; other codecs can be
 * plugged in with `register`.
 *
 * @example
 * ```typescript
 * const decoded = FilterPipeline.decode(data, { name: "FlateDecode" });
 * ```
 */
export class FilterPipeline {
  private static filters = new Map<string, Filter>();

  static register(filter: Filter): void {
    FilterPipeline.filters.set(filter.name, filter);
  }

  static hasFilter(name: string): boolean {
    return FilterPipeline.filters.has(name);
  }

  static getFilter(name: string): Filter | undefined {
    return FilterPipeline.filters.get(name);
  }

  /**
   * Decode data through a chain of filters, in order.
   *
   * @throws {StreamDecodeError} if a filter is not registered
   */
  static decode(data: Uint8Array, filters: FilterSpec | FilterSpec[]): Uint8Array {
    let result = data;

    for (const spec of Array.isArray(filters) ? filters : [filters]) {
      result = FilterPipeline.require(spec.name).decode(result, spec.params);
    }

    return result;
  }

  /**
   * Encode data through a chain of filters.
   *
   * Filters are applied in reverse order: for /Filter [/A /B], B's encoder
   * runs first.
   *
   * @throws {StreamDecodeError} if a filter is not registered
   */
  static encode(data: Uint8Array, filters: FilterSpec | FilterSpec[]): Uint8Array {
    let result = data;

    for (const spec of (Array.isArray(filters) ? filters : [filters]).toReversed()) {
      result = FilterPipeline.require(spec.name).encode(result, spec.params);
    }

    return result;
  }

  /**
   * Restore the default registrations. Mainly useful for testing.
   */
  static reset(): void {
    FilterPipeline.filters.clear();
    FilterPipeline.register(new FlateFilter());
  }

  private static require(name: string): Filter {
    const filter = FilterPipeline.filters.get(name);

    if (!filter) {
      throw new StreamDecodeError(`Unknown filter: ${name}`);
    }

    return filter;
  }
}

FilterPipeline.reset();
