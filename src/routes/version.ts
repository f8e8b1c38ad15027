import type { FastifyInstance } from 'fastify';
import fs from 'node:fs';
import { z } from 'zod';

const packageSchema = z.object({
  name: z.string().optional(),
  version: z.string().optional()
});

type PackageInfo = { name: string; version: string };

function readPackageInfo(): PackageInfo {
  const fallback: PackageInfo = { name: 'ip-reputation-dns', version: '0.0.0' };
  try {
    const raw: unknown = JSON.parse(fs.readFileSync(new URL('../../package.json', import.meta.url), 'utf8'));
    const parsed = packageSchema.safeParse(raw);
    if (!parsed.success) return fallback;
    return {
      name: parsed.data.name?.trim() || fallback.name,
      version: parsed.data.version?.trim() || fallback.version
    };
  } catch {
    return fallback;
  }
}

export async function registerVersionRoutes(app: FastifyInstance): Promise<void> {
  const pkg = readPackageInfo();

  app.get('/api/version', async () => {
    // Container builds stamp the release through APP_VERSION.
    const envVersion = String(process.env.APP_VERSION || '').trim();
    return { name: pkg.name, version: envVersion || pkg.version };
  });
}
