/**
 * @sketchpad/node
 *
 * Node.js file output for sketchpad: PNG encoding and export of sketches and
 * turtle screens.
 */

export { PNG_SIGNATURE, crc32, encodeBitmap, encodePng, pngChunk } from "./png.js";
export { savePng, saveScreen, saveSketch } from "./export.js";
