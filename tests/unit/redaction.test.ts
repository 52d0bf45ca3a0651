import { test, expect } from "vitest";
import { maskSensitiveObject, redactSecrets } from "../../src/shared/logging.js";

test("redacts secret assignments", () => {
  expect(redactSecrets("OPENLIVE_ACCESS_SECRET=test-secret next")).toBe("OPENLIVE_ACCESS_SECRET=[REDACTED] next");
});

test("redacts quoted secret fields and keeps JSON valid", () => {
  const json = JSON.stringify({ Authorization: "abc123", accessKey: "test-key" });
  expect(redactSecrets(json)).toBe('{"Authorization":"[REDACTED]","accessKey":"test-key"}');
});

test("masks secrets inside objects", () => {
  expect(maskSensitiveObject({ "live.access_secret": "test-secret", "live.app_id": 1001 })).toEqual({
    "live.access_secret": "[REDACTED]",
    "live.app_id": 1001,
  });
});

test("leaves ordinary payloads alone", () => {
  const payload = { cmd: "LIVE_OPEN_PLATFORM_DM", data: { msg: "hello" } };
  expect(maskSensitiveObject(payload)).toEqual(payload);
});
