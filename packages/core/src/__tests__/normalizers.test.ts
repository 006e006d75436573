import { describe, it, expect } from "vitest";
import {
  AnthropicUsageReportSchema,
  BEDROCK_QUERY_IDS,
  normalizeAnthropicUsage,
  normalizeBedrockUsage,
  normalizeOpenAIUsage,
} from "../normalizers";

describe("Usage Normalizers", () => {
  describe("normalizeOpenAIUsage", () => {
    it("should convert cents to dollars and derive the balance", () => {
      const usage = normalizeOpenAIUsage(
        { total_usage: 5000 },
        { hard_limit_usd: 100, has_payment_method: true }
      );
      expect(usage).toEqual({
        costUsd: 50,
        promptTokens: 0,
        completionTokens: 0,
        requestCount: 0,
        remainingBalance: 50,
      });
    });

    it("should leave the balance absent without a payment method", () => {
      const usage = normalizeOpenAIUsage(
        { total_usage: 5000 },
        { hard_limit_usd: 100, has_payment_method: false }
      );
      expect(usage.costUsd).toBe(50);
      expect(usage.remainingBalance).toBeUndefined();
      expect("remainingBalance" in usage).toBe(false);
    });

    it("should leave the balance absent regardless of spend", () => {
      const usage = normalizeOpenAIUsage(
        { total_usage: 0 },
        { hard_limit_usd: 0, has_payment_method: false }
      );
      expect(usage.remainingBalance).toBeUndefined();
    });

    it("should report a negative balance when spend exceeds the limit", () => {
      const usage = normalizeOpenAIUsage(
        { total_usage: 15000 },
        { hard_limit_usd: 120, has_payment_method: true }
      );
      expect(usage.remainingBalance).toBe(-30);
    });
  });

  describe("normalizeAnthropicUsage", () => {
    const report = AnthropicUsageReportSchema.parse({
      data: [
        {
          starting_at: "2024-03-01T00:00:00Z",
          ending_at: "2024-03-02T00:00:00Z",
          results: [
            {
              model: "claude-3-5-sonnet-20241022",
              uncached_input_tokens: 1000,
              cache_read_input_tokens: 200,
              cache_creation: { ephemeral_1h_input_tokens: 30, ephemeral_5m_input_tokens: 70 },
              output_tokens: 400,
            },
            {
              model: "claude-3-5-haiku-20241022",
              uncached_input_tokens: 9999,
              output_tokens: 9999,
            },
          ],
        },
        {
          starting_at: "2024-03-02T00:00:00Z",
          ending_at: "2024-03-03T00:00:00Z",
          results: [
            {
              model: "claude-3-5-sonnet-20241022",
              uncached_input_tokens: 500,
              output_tokens: 100,
            },
          ],
        },
      ],
      has_more: false,
      next_page: null,
    });

    it("should sum input and output tokens of the requested model", () => {
      expect(normalizeAnthropicUsage(report, "claude-3-5-sonnet-20241022")).toEqual({
        promptTokens: 1800,
        completionTokens: 500,
        requestCount: 0,
      });
    });

    it("should not report a cost", () => {
      const usage = normalizeAnthropicUsage(report, "claude-3-5-sonnet-20241022");
      expect(usage.costUsd).toBeUndefined();
      expect(usage.remainingBalance).toBeUndefined();
    });

    it("should return zeros for a model without usage", () => {
      expect(normalizeAnthropicUsage(report, "claude-3-opus-20240229")).toEqual({
        promptTokens: 0,
        completionTokens: 0,
        requestCount: 0,
      });
    });

    it("should tolerate results without token breakdowns", () => {
      const sparse = AnthropicUsageReportSchema.parse({
        data: [
          {
            starting_at: "2024-03-01T00:00:00Z",
            ending_at: "2024-03-02T00:00:00Z",
            results: [{ model: "claude-3-haiku-20240307" }],
          },
        ],
      });
      expect(normalizeAnthropicUsage(sparse, "claude-3-haiku-20240307")).toEqual({
        promptTokens: 0,
        completionTokens: 0,
        requestCount: 0,
      });
    });
  });

  describe("normalizeBedrockUsage", () => {
    it("should sum the values of each query", () => {
      const usage = normalizeBedrockUsage([
        { Id: BEDROCK_QUERY_IDS.INPUT_TOKENS, Values: [1200, 800] },
        { Id: BEDROCK_QUERY_IDS.OUTPUT_TOKENS, Values: [300] },
        { Id: BEDROCK_QUERY_IDS.INVOCATIONS, Values: [4, 6] },
      ]);
      expect(usage).toEqual({ promptTokens: 2000, completionTokens: 300, requestCount: 10 });
    });

    it("should treat missing series as zero", () => {
      expect(normalizeBedrockUsage([{ Id: BEDROCK_QUERY_IDS.INVOCATIONS }])).toEqual({
        promptTokens: 0,
        completionTokens: 0,
        requestCount: 0,
      });
    });
  });
});
