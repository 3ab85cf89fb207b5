/**
 * CSV reader for the embedded result body.
 *
 * Quote-aware per RFC 4180: quoted fields may contain commas, doubled
 * quotes and line breaks. A quote only opens a quoted field at the start of
 * a field; elsewhere it is kept as written. Field values are not trimmed.
 */

/**
 * Split CSV text into records. `\r\n`, `\n` and `\r` all end a record, and
 * an empty line becomes an empty record.
 */
export function parseCsv(text: string): string[][] {
  const records: string[][] = [];
  let fields: string[] = [];
  let current = "";
  let atFieldStart = true;
  let lineEmpty = true;
  let inQuotes = false;
  let i = 0;

  const endRecord = () => {
    if (lineEmpty) {
      records.push([]);
    } else {
      fields.push(current);
      records.push(fields);
    }
    fields = [];
    current = "";
    atFieldStart = true;
    lineEmpty = true;
  };

  while (i < text.length) {
    const ch = text[i];
    if (inQuotes) {
      if (ch === '"') {
        if (i + 1 < text.length && text[i + 1] === '"') {
          current += '"';
          i += 2;
        } else {
          inQuotes = false;
          i++;
        }
      } else {
        current += ch;
        i++;
      }
      continue;
    }

    if (ch === "\r" || ch === "\n") {
      endRecord();
      i += ch === "\r" && text[i + 1] === "\n" ? 2 : 1;
      continue;
    }

    lineEmpty = false;
    if (ch === '"' && atFieldStart) {
      inQuotes = true;
    } else if (ch === ",") {
      fields.push(current);
      current = "";
      atFieldStart = true;
      i++;
      continue;
    } else {
      current += ch;
    }
    atFieldStart = false;
    i++;
  }

  if (!lineEmpty) endRecord();
  return records;
}
