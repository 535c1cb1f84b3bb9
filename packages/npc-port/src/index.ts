export { attachPort, type AttachPortOptions, type PortLike } from "./port.ts";
