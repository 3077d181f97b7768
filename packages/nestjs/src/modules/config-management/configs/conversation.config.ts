import { registerAs } from "@nestjs/config";

export default registerAs("conversation", () => {
  const seed = Number.parseInt(String(process.env.RESPONSE_RANDOM_SEED), 10);
  const recentLimit = Number.parseInt(
    String(process.env.SESSION_RECENT_LIMIT),
    10,
  );

  return {
    randomSeed: Number.isNaN(seed) ? undefined : seed,
    recentLimit: Number.isNaN(recentLimit) ? 5 : recentLimit,
  };
});
