import 'reflect-metadata';
import { ApplicationBootstrap } from './bootstrap';
import { ApplicationServer } from './server';

const ENVIRONMENTS = ['development', 'production', 'test'] as const;

function resolveEnvironment(value: string | undefined): (typeof ENVIRONMENTS)[number] {
  return ENVIRONMENTS.find(environment => environment === value) ?? 'development';
}

async function main(): Promise<void> {
  const bootstrap = new ApplicationBootstrap({
    environment: resolveEnvironment(process.env.NODE_ENV),
    enableBackgroundJobs: process.env.BACKGROUND_JOBS_ENABLED !== 'false'
  });

  const server = new ApplicationServer(bootstrap);
  await server.start();
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('Failed to start application:', error);
    process.exit(1);
  });
}

export { main };
