import assert from "node:assert/strict";
import test from "node:test";
import { withRetry } from "./retry";
import { DuplicateEmailError } from "./storage.types";

test("retries until the call succeeds", async () => {
  let calls = 0;
  const result = await withRetry(
    async () => {
      calls++;
      if (calls < 3) throw new Error(`attempt ${calls} failed`);
      return "ok";
    },
    { attempts: 3, baseDelayMs: 0 },
  );

  assert.equal(result, "ok");
  assert.equal(calls, 3);
});

test("rethrows the last error once attempts run out", async () => {
  let calls = 0;
  await assert.rejects(
    withRetry(
      async () => {
        calls++;
        throw new Error(`attempt ${calls} failed`);
      },
      { attempts: 2, baseDelayMs: 0 },
    ),
    { message: "attempt 2 failed" },
  );
  assert.equal(calls, 2);
});

test("a single attempt does not retry", async () => {
  let calls = 0;
  await assert.rejects(
    withRetry(
      async () => {
        calls++;
        throw new Error("unavailable");
      },
      { attempts: 1 },
    ),
  );
  assert.equal(calls, 1);
});

test("errors rejected by shouldRetry are rethrown without another attempt", async () => {
  let calls = 0;
  await assert.rejects(
    withRetry(
      async () => {
        calls++;
        throw new DuplicateEmailError("grower@example.com");
      },
      { attempts: 3, baseDelayMs: 0, shouldRetry: (err) => !(err instanceof DuplicateEmailError) },
    ),
    DuplicateEmailError,
  );
  assert.equal(calls, 1);
});
