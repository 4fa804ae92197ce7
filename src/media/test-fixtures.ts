/**
 * Build a minimal big-endian JPEG whose EXIF sub-IFD carries DateTimeOriginal.
 *
 * Layout (offsets relative to the TIFF header):
 *   0   TIFF header
 *   8   IFD0: one entry, ExifIFDPointer -> 26
 *   26  Exif IFD: one entry, DateTimeOriginal -> 44
 *   44  ASCII value, NUL-terminated
 */
export function buildJpegWithDateTimeOriginal(value: string): Buffer {
  const soi = Buffer.from([0xff, 0xd8]);
  const tiffHeader = Buffer.from("MM\x00\x2a\x00\x00\x00\x08", "binary");

  const ifd0 = Buffer.alloc(2 + 12 + 4);
  ifd0.writeUInt16BE(1, 0);
  ifd0.writeUInt16BE(0x8769, 2); // ExifIFDPointer
  ifd0.writeUInt16BE(4, 4); // LONG
  ifd0.writeUInt32BE(1, 6);
  ifd0.writeUInt32BE(26, 10);
  ifd0.writeUInt32BE(0, 14);

  const dateBytes = Buffer.from(value + "\0", "ascii");
  const exifIfd = Buffer.alloc(2 + 12 + 4);
  exifIfd.writeUInt16BE(1, 0);
  exifIfd.writeUInt16BE(0x9003, 2); // DateTimeOriginal
  exifIfd.writeUInt16BE(2, 4); // ASCII
  exifIfd.writeUInt32BE(dateBytes.length, 6);
  exifIfd.writeUInt32BE(44, 10);
  exifIfd.writeUInt32BE(0, 14);

  const tiffData = Buffer.concat([tiffHeader, ifd0, exifIfd, dateBytes]);

  const app1Marker = Buffer.from([0xff, 0xe1]);
  const exifHeader = Buffer.from("Exif\x00\x00", "binary");
  const app1Length = Buffer.alloc(2);
  app1Length.writeUInt16BE(2 + exifHeader.length + tiffData.length, 0);

  const eoi = Buffer.from([0xff, 0xd9]);

  return Buffer.concat([soi, app1Marker, app1Length, exifHeader, tiffData, eoi]);
}

/** A JPEG whose APP1 segment claims EXIF but carries garbage after the header. */
export function buildJpegWithCorruptExif(): Buffer {
  const soi = Buffer.from([0xff, 0xd8]);
  const app1Marker = Buffer.from([0xff, 0xe1]);
  const exifHeader = Buffer.from("Exif\x00\x00", "binary");
  const garbage = Buffer.from("XX\x00\x2a\xff\xff\xff\xff-corrupt-metadata", "binary");
  const app1Length = Buffer.alloc(2);
  app1Length.writeUInt16BE(2 + exifHeader.length + garbage.length, 0);
  const eoi = Buffer.from([0xff, 0xd9]);
  return Buffer.concat([soi, app1Marker, app1Length, exifHeader, garbage, eoi]);
}
