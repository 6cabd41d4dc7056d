/**
 * Smoke test for a running server: health and service info endpoints.
 *
 * Usage: npm run smoke
 *
 * Exits with code 0 on success, 1 on failure.
 */

import { z } from "zod";

const BASE_URL = process.env.BASE_URL || "http://localhost:5000";

const healthSchema = z.object({
  ok: z.literal(true),
  service: z.string(),
});

const infoSchema = z.object({
  status: z.literal("running"),
  enrolled_users: z.number().int().nonnegative(),
  required_clips: z.number().int().positive(),
  threshold: z.number(),
});

async function checkEndpoint(path: string, schema: z.ZodTypeAny): Promise<boolean> {
  const url = `${BASE_URL}${path}`;

  try {
    const response = await fetch(url);

    if (response.status !== 200) {
      console.error(`FAIL: ${path} returned status ${response.status}`);
      return false;
    }

    const data: unknown = await response.json();
    const result = schema.safeParse(data);

    if (!result.success) {
      console.error(`FAIL: ${path} returned unexpected response:`, data);
      return false;
    }

    console.log(`PASS: ${path} returned 200 with valid response`);
    return true;
  } catch (error) {
    console.error(`FAIL: ${path} - ${error instanceof Error ? error.message : "Unknown error"}`);
    return false;
  }
}

async function main(): Promise<void> {
  console.log(`Smoke test starting against ${BASE_URL}\n`);

  const results = await Promise.all([
    checkEndpoint("/healthz", healthSchema),
    checkEndpoint("/", infoSchema),
  ]);

  console.log("");
  if (results.every((result) => result)) {
    console.log("Smoke test PASSED");
    process.exit(0);
  } else {
    console.log("Smoke test FAILED");
    process.exit(1);
  }
}

void main();
