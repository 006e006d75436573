export {
  OpenAIBillingUsageSchema,
  OpenAISubscriptionSchema,
  normalizeOpenAIUsage,
  type OpenAIBillingUsage,
  type OpenAISubscription,
} from "./openai";
export {
  AnthropicUsageReportSchema,
  normalizeAnthropicUsage,
  type AnthropicUsageReport,
} from "./anthropic";
export { BEDROCK_QUERY_IDS, normalizeBedrockUsage } from "./bedrock";
