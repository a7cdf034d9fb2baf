import { ByteWriter } from "#src/io/byte-writer";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNumber } from "#src/objects/pdf-number";
import type { PdfObject } from "#src/objects/pdf-object";
import type { RefLookup } from "#src/objects/pdf-primitive";
import type { PdfRef } from "#src/objects/pdf-ref";
import { PdfStream } from "#src/objects/pdf-stream";

export interface ObjectStreamMember {
  ref: PdfRef;
  value: PdfObject;
}

/**
 * Create an empty object stream container.
 */
export function createObjectStream(): PdfStream {
  return PdfStream.fromDict({ Type: PdfName.ObjStm, N: PdfNumber.of(0), First: PdfNumber.of(0) });
}

/**
 * (Re)fill an object stream with `members`, in order.
 *
 * The decoded data is the `objNum offset` index, a newline, then the
 * member values separated by newlines. The result is flate-compressed.
 * A member's index in the container is its position in `members`.
 */
export function packObjectStream(container: PdfStream, members: ObjectStreamMember[], refs?: RefLookup): void {
  const body = new ByteWriter({ initialSize: 1024 });
  const index: string[] = [];

  for (const { ref, value } of members) {
    index.push(`${ref.objectNumber} ${body.position}`);
    value.toBytes(body, refs);
    body.writeAscii("\n");
  }

  const header = `${index.join(" ")}\n`;
  const data = new ByteWriter({ initialSize: header.length + body.position });

  data.writeAscii(header);
  data.writeBytes(body.toBytes());

  container.set("Type", PdfName.ObjStm);
  container.set("N", PdfNumber.of(members.length));
  container.set("First", PdfNumber.of(header.length));
  container.setEncodedData(data.toBytes(), [{ name: "FlateDecode" }]);
}
