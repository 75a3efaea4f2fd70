/**
 * Transport Exports
 */

export { ConsoleTransport, type ConsoleTransportOptions } from "./console.js";
export { FileTransport, type FileTransportOptions } from "./file.js";
