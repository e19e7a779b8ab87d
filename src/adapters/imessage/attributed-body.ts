const NSSTRING_MARKER = Buffer.from('NSString', 'latin1');
const STRING_TYPE = 0x2b; // '+'
const INT16_FOLLOWS = 0x81;
const INT32_FOLLOWS = 0x82;

// Class-header bytes between the marker and the string type tag
const MAX_HEADER_GAP = 8;

/**
 * Pull the plain text out of a Messages `attributedBody` blob (an archived
 * NSAttributedString in typedstream form). Returns null when the blob is
 * missing or does not hold a readable NSString.
 */
export function decodeAttributedBody(blob: Buffer | null | undefined): string | null {
  if (!blob || blob.length === 0) {
    return null;
  }

  const marker = blob.indexOf(NSSTRING_MARKER);
  if (marker === -1) {
    return null;
  }

  const headerStart = marker + NSSTRING_MARKER.length;
  const typeTag = blob.indexOf(STRING_TYPE, headerStart);
  if (typeTag === -1 || typeTag - headerStart > MAX_HEADER_GAP) {
    return null;
  }

  let offset = typeTag + 1;
  if (offset >= blob.length) {
    return null;
  }

  let length: number;
  const lead = blob.readUInt8(offset);
  offset += 1;

  if (lead === INT16_FOLLOWS) {
    if (offset + 2 > blob.length) return null;
    length = blob.readUInt16LE(offset);
    offset += 2;
  } else if (lead === INT32_FOLLOWS) {
    if (offset + 4 > blob.length) return null;
    length = blob.readUInt32LE(offset);
    offset += 4;
  } else if (lead < 0x80) {
    length = lead;
  } else {
    return null;
  }

  if (length === 0 || offset + length > blob.length) {
    return null;
  }

  return blob.toString('utf8', offset, offset + length);
}
