import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  // Native driver and logger must be required at runtime, not bundled.
  serverExternalPackages: ["better-sqlite3", "winston"],
};

export default nextConfig;
