import type { NextConfig } from 'next';

const nextConfig: NextConfig = {
  transpilePackages: [
    '@careernav/agents',
    '@careernav/core',
    '@careernav/db',
    '@careernav/llm',
    '@careernav/schemas',
  ],
  serverExternalPackages: ['pdf-parse', 'pg'],
  webpack: (config) => {
    // agents import their TypeScript siblings with .js specifiers
    config.resolve.extensionAlias = {
      '.js': ['.ts', '.tsx', '.js'],
    };
    return config;
  },
};

export default nextConfig;
