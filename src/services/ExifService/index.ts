export type * from "./Exif";
export type * from "./ExifService";
export * from "./ExifServiceExifTool";
