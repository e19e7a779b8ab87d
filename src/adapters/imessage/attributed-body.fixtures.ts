/**
 * Build an `attributedBody` blob the way Messages archives a plain
 * NSAttributedString, for tests.
 */
export function archivedText(text: string): Buffer {
  const bytes = Buffer.from(text, 'utf8');

  let length: Buffer;
  if (bytes.length < 0x80) {
    length = Buffer.from([bytes.length]);
  } else {
    length = Buffer.alloc(3);
    length.writeUInt8(0x81, 0);
    length.writeUInt16LE(bytes.length, 1);
  }

  return Buffer.concat([
    Buffer.from([0x04, 0x0b]),
    Buffer.from('streamtyped', 'latin1'),
    Buffer.from([0x81, 0xe8, 0x03, 0x84, 0x01, 0x40, 0x84, 0x84, 0x84]),
    Buffer.from('\x12NSAttributedString', 'latin1'),
    Buffer.from([0x00, 0x84, 0x84]),
    Buffer.from('\x08NSObject', 'latin1'),
    Buffer.from([0x00, 0x85, 0x92, 0x84, 0x84, 0x84]),
    Buffer.from('NSString', 'latin1'),
    Buffer.from([0x01, 0x94, 0x84, 0x01, 0x2b]),
    length,
    bytes,
    Buffer.from([0x86, 0x84, 0x02, 0x69, 0x49]),
  ]);
}
