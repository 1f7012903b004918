/**
 * Wire shapes exchanged with the SMS gateway. Field names follow the
 * gateway's JSON (snake_case) so values can be passed through untouched.
 */

import { z } from "zod";

/** A stored SMS message, as returned by history reads and incoming events. */
export const SmsStoredMessageSchema = z.object({
  message_id: z.number().int(),
  phone_number: z.string(),
  message_content: z.string(),
  /** Modem-assigned reference, only present for outgoing messages. */
  message_reference: z.number().int().nullish(),
  is_outgoing: z.boolean(),
  status: z.string(),
  /** Unix timestamp (seconds). */
  created_at: z.number().int().nullish(),
  completed_at: z.number().int().nullish(),
});

export const SmsDeliveryReportSchema = z.object({
  report_id: z.number().int().nullish(),
  /** SMS TP-Status from the network. */
  status: z.number().int(),
  is_final: z.boolean(),
  created_at: z.number().int().nullish(),
});

export const LatestNumberSchema = z.object({
  phone_number: z.string(),
  friendly_name: z.string().nullish(),
});

export const SmsSendResponseSchema = z.object({
  message_id: z.number().int(),
  reference_id: z.number().int(),
});

export const NetworkStatusSchema = z.object({
  registration: z.number().int(),
  technology: z.number().int(),
});

export const SignalStrengthSchema = z.object({
  rssi: z.number().int(),
  ber: z.number().int(),
});

export const NetworkOperatorSchema = z.object({
  status: z.number().int(),
  format: z.number().int(),
  operator: z.string(),
});

export const BatteryLevelSchema = z.object({
  status: z.number().int(),
  charge: z.number().int(),
  voltage: z.number(),
});

export type SmsStoredMessage = z.infer<typeof SmsStoredMessageSchema>;
export type SmsDeliveryReport = z.infer<typeof SmsDeliveryReportSchema>;
export type LatestNumber = z.infer<typeof LatestNumberSchema>;
export type SmsSendResponse = z.infer<typeof SmsSendResponseSchema>;
export type NetworkStatus = z.infer<typeof NetworkStatusSchema>;
export type SignalStrength = z.infer<typeof SignalStrengthSchema>;
export type NetworkOperator = z.infer<typeof NetworkOperatorSchema>;
export type BatteryLevel = z.infer<typeof BatteryLevelSchema>;

export interface SmsOutgoingMessage {
  /** Target number in international format. */
  to: string;
  /** Split into multiple parts by the gateway when needed. */
  content: string;
  /** Relative validity period; the gateway defaults to 24 hours. */
  validity_period?: number;
  /** Send as a class 0 (flash) message. */
  flash?: boolean;
  /** Seconds the gateway waits for the modem before failing the send. */
  timeout?: number;
}

/** limit/offset/reverse options understood by the history endpoints. */
export interface PaginationOptions {
  limit?: number;
  offset?: number;
  reverse?: boolean;
}
