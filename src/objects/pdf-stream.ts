import type { FilterSpec } from "#src/filters/filter";
import { FilterPipeline } from "#src/filters/filter-pipeline";
import type { ByteWriter } from "#src/io/byte-writer";
import { PdfArray } from "./pdf-array";
import { PdfDict } from "./pdf-dict";
import { PdfName } from "./pdf-name";
import type { PdfObject } from "./pdf-object";
import type { RefLookup } from "./pdf-primitive";

/** Stream types that make up file structure rather than content. */
export type StructuralStreamType = "ObjStm" | "XRef";

/** Whether `value` is a stream whose /Type is `type`. */
export function isStreamOfType(value: PdfObject | null, type: StructuralStreamType): boolean {
  return value instanceof PdfStream && value.getName("Type")?.value === type;
}

// A single filter entry, an array of them, or nothing
function asList(entry: PdfObject | undefined): PdfObject[] {
  if (entry instanceof PdfArray) {
    return [...entry];
  }

  return entry === undefined ? [] : [entry];
}

/**
 * PDF stream object (dictionary + binary data).
 *
 * In PDF:
 * ```
 * << /Length 5 /Filter /FlateDecode >>
 * stream
 * ...binary data...
 * endstream
 * ```
 *
 * `data` holds the raw bytes exactly as stored, still encoded by /Filter.
 */
export class PdfStream extends PdfDict {
  override get type(): "stream" {
    return "stream";
  }

  private _data: Uint8Array;

  constructor(
    dict?: PdfDict | Iterable<[PdfName | string, PdfObject]>,
    data: Uint8Array = new Uint8Array(0),
  ) {
    super(dict);

    this._data = data;
  }

  get data(): Uint8Array {
    return this._data;
  }

  /**
   * Replace the stream content with unencoded bytes.
   *
   * Clears /Filter and /DecodeParms since they no longer describe the data.
   */
  setData(value: Uint8Array): void {
    this.delete("Filter");
    this.delete("DecodeParms");
    this._data = value;
  }

  /**
   * Replace the stream content with `value` encoded through `filters`, and
   * record the chain in /Filter.
   */
  setEncodedData(value: Uint8Array, filters: FilterSpec[]): void {
    this.setData(FilterPipeline.encode(value, filters));

    if (filters.length === 1) {
      this.set("Filter", PdfName.of(filters[0].name));
    } else if (filters.length > 1) {
      this.set("Filter", new PdfArray(filters.map(f => PdfName.of(f.name))));
    }
  }

  static fromDict(
    entries: Record<string, PdfObject>,
    data: Uint8Array = new Uint8Array(0),
  ): PdfStream {
    return new PdfStream(Object.entries(entries), data);
  }

  /**
   * Decode the stream data through its /Filter chain.
   * Results are not cached.
   *
   * @throws {StreamDecodeError} if a filter fails or is unknown
   */
  getDecodedData(): Uint8Array {
    const filterSpecs = this.filterSpecs();

    if (filterSpecs.length === 0) {
      return this._data;
    }

    return FilterPipeline.decode(this._data, filterSpecs);
  }

  /** /Filter names paired with their /DecodeParms, in decoding order. */
  filterSpecs(): FilterSpec[] {
    const params = asList(this.get("DecodeParms"));

    return asList(this.get("Filter")).flatMap((filter, i) => {
      if (!(filter instanceof PdfName)) {
        return [];
      }

      const param = params[i];

      return [{ name: filter.value, params: param instanceof PdfDict ? param : undefined }];
    });
  }

  /**
   * Write the stream. /Length is always written first, as a direct
   * value matching `data`.
   */
  override toBytes(writer: ByteWriter, refs?: RefLookup): void {
    writer.writeAscii(`<</Length ${this._data.length}\n`);
    this.writeEntries(writer, refs, PdfName.Length);
    writer.writeAscii(">>\nstream\n");
    writer.writeBytes(this._data);
    writer.writeAscii("\nendstream");
  }
}
