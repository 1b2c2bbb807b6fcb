import type { Server } from 'node:http';
import { createApp, type AppOptions } from '../../app';
import type { CatalogServices } from '../../routes/catalog';
import { CatalogResolver, FoodCatalogService, type CandidateStore, type ExerciseSummary } from '../../services/catalog';
import { InMemoryCandidateStore, InMemoryFoodStore } from './inMemoryStore';

let server: Server | null = null;

export function createTestServices(
  stores: { exercises?: CandidateStore<ExerciseSummary>; foods?: InMemoryFoodStore } = {}
): CatalogServices {
  const foodStore = stores.foods ?? new InMemoryFoodStore();
  const foods = new CatalogResolver(foodStore, { name: 'foods', snapshotTtlMs: 60_000 });

  return {
    exercises: new CatalogResolver(stores.exercises ?? new InMemoryCandidateStore<ExerciseSummary>(), {
      name: 'exercises',
      snapshotTtlMs: 60_000,
    }),
    foods,
    foodCatalog: new FoodCatalogService(foodStore, foods),
  };
}

export async function startTestServer(
  services: CatalogServices,
  options: AppOptions = { searchRateLimitPerMinute: 1000 }
): Promise<{ baseUrl: string }> {
  const app = createApp(services, options);

  return new Promise((resolve, reject) => {
    const listening = app.listen(0, '127.0.0.1', () => {
      const address = listening.address();
      if (typeof address === 'object' && address !== null) {
        resolve({ baseUrl: `http://127.0.0.1:${address.port}` });
      } else {
        reject(new Error('Failed to get server address'));
      }
    });
    server = listening;

    listening.on('error', reject);
  });
}

export async function stopTestServer(): Promise<void> {
  const current = server;
  if (!current) return;

  server = null;
  return new Promise((resolve, reject) => {
    current.close((error) => (error ? reject(error) : resolve()));
  });
}

export async function readJson<T>(response: Response): Promise<T> {
  const body: T = JSON.parse(await response.text());
  return body;
}
