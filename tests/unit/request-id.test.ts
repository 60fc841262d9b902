import { describe, it, expect } from "vitest";
import type { IncomingMessage } from "node:http";
import type { FastifyRequest } from "fastify";
import { generateRequestId, getOrGenerateRequestId, getRequestId } from "../../src/utils/request-id.js";

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

function rawRequest(headers: IncomingMessage["headers"]): Pick<IncomingMessage, "headers"> {
  return { headers };
}

describe("request-id utilities", () => {
  describe("generateRequestId", () => {
    it("generates unique UUID v4 values", () => {
      const first = generateRequestId();
      expect(first).toMatch(UUID_V4);
      expect(generateRequestId()).not.toBe(first);
    });
  });

  describe("getOrGenerateRequestId", () => {
    it("takes the X-Request-Id header, trimmed", () => {
      expect(getOrGenerateRequestId(rawRequest({ "x-request-id": "  existing-id-123 " }))).toBe("existing-id-123");
    });

    it("generates an id when the header is missing or blank", () => {
      expect(getOrGenerateRequestId(rawRequest({}))).toMatch(UUID_V4);
      expect(getOrGenerateRequestId(rawRequest({ "x-request-id": "   " }))).toMatch(UUID_V4);
    });
  });

  describe("getRequestId", () => {
    it("falls back to unknown without a request", () => {
      expect(getRequestId()).toBe("unknown");
    });

    it("reads the id Fastify assigned", () => {
      const request: Pick<FastifyRequest, "id"> = { id: "req-42" };
      expect(getRequestId(request)).toBe("req-42");
    });
  });
});
