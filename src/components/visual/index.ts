export { Minimap, sampleRows } from "./minimap.js";
