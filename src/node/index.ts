export { FileByteSource } from "./fileSource.js";
