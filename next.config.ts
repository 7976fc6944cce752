import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  // Enable standalone output for Docker deployment
  output: "standalone",

  reactStrictMode: process.env.NODE_ENV === "development",

  devIndicators: false,
};

export default nextConfig;
