import { z } from "zod";
import { getChainRuntime } from "@/src/lib/chain/runtime";
import { loadOptionsChain } from "@/src/lib/chain/service";
import { CatalogUnavailableError } from "@/src/lib/errors";
import { error } from "@/src/lib/logger";

export const dynamic = "force-dynamic";

const querySchema = z.object({
  underlying: z
    .string()
    .trim()
    .regex(/^[A-Za-z0-9]{1,12}$/, "underlying must be 1-12 alphanumeric characters")
    .optional(),
  mode: z.enum(["mid", "mark"]).default("mid"),
  includeExpired: z.enum(["0", "1"]).default("0")
});

export async function GET(request: Request) {
  const { searchParams } = new URL(request.url);
  const parsed = querySchema.safeParse({
    underlying: searchParams.get("underlying") ?? undefined,
    mode: searchParams.get("mode") ?? undefined,
    includeExpired: searchParams.get("includeExpired") ?? undefined
  });

  if (!parsed.success) {
    return Response.json(
      { error: parsed.error.issues.map((issue) => issue.message).join("; ") },
      { status: 400 }
    );
  }

  try {
    const { config, client } = getChainRuntime();
    const result = await loadOptionsChain(client, {
      underlying: parsed.data.underlying ?? config.defaultUnderlying,
      pricingMode: parsed.data.mode,
      futureOnly: parsed.data.includeExpired === "0",
      quoteTimeoutMs: config.quoteTimeoutMs
    });
    return Response.json(result);
  } catch (err) {
    error("API", "Failed to build options chain:", err);
    const status = err instanceof CatalogUnavailableError ? 502 : 500;
    return Response.json(
      { error: err instanceof Error ? err.message : "Unable to build options chain." },
      { status }
    );
  }
}
