import type { NextConfig } from 'next';

const nextConfig: NextConfig = {
  /* API routes only; the cookbook lives in process memory */
  poweredByHeader: false,
};

export default nextConfig;
