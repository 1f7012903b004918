export {
  ExecutionDriver,
  type ExecutionDriverOptions,
  type BackgroundHandle,
} from "./driver.js";
export { SmsClient, type SmsClientOptions } from "./client.js";
