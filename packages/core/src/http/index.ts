export {
  createSmsHttpClient,
  type SmsHttpClient,
  type SmsHttpClientOptions,
} from "./client.js";
export { readEnvelope, readModemResponse } from "./response.js";
