export {
  createBackendTransport,
  buildBackendEnvironment,
} from "./create-backend-transport.js";
export { createCallerTransport } from "./create-caller-transport.js";
