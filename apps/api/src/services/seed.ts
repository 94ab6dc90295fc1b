import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { Store } from './store.js';
import { generateCatalogId } from '../utils/ids.js';

const vehicleSchema = z.object({
  id: z.string().min(1).optional(),
  vin: z.string().min(11).max(17),
  make: z.string().min(1),
  model: z.string().min(1),
  year: z.number().int().min(1950).max(2100),
  fuel: z.enum(['petrol', 'diesel', 'hybrid', 'electric']),
  transmission: z.enum(['manual', 'automatic']),
  mileage: z.number().int().nonnegative(),
  condition: z.enum(['excellent', 'good', 'fair', 'poor']),
  marketValue: z.number().positive(),
  costBasis: z.number().positive().optional(),
  listPrice: z.number().positive().optional(),
  inStock: z.boolean().optional()
});

const clientSchema = z.object({
  id: z.string().min(1).optional(),
  firstName: z.string().min(1),
  lastName: z.string().min(1),
  email: z.string().email().optional(),
  budgetMin: z.number().nonnegative(),
  budgetMax: z.number().positive(),
  preferredFuel: z.enum(['petrol', 'diesel', 'hybrid', 'electric']).optional(),
  preferredTransmission: z.enum(['manual', 'automatic']).optional(),
  offerPreference: z.enum(['purchase', 'lease', 'subscription', 'flexible']).optional(),
  loyaltyScore: z.number().min(0).max(1).optional(),
  riskScore: z.number().min(0).max(1).optional()
}).refine((value) => value.budgetMin <= value.budgetMax, { message: 'budget_range_inverted' });

export const catalogFixtureSchema = z.object({
  vehicles: z.array(vehicleSchema).default([]),
  clients: z.array(clientSchema).default([])
});

export type CatalogFixture = z.infer<typeof catalogFixtureSchema>;

export function seedCatalog(store: Store, input: unknown): { vehicles: number; clients: number } {
  const fixture = catalogFixtureSchema.parse(input);

  store.transaction(() => {
    for (const vehicle of fixture.vehicles) {
      store.upsertVehicle({
        ...vehicle,
        id: vehicle.id ?? generateCatalogId('veh', `${vehicle.make}-${vehicle.model}-${vehicle.year}`)
      });
    }

    for (const client of fixture.clients) {
      store.upsertClient({
        ...client,
        id: client.id ?? generateCatalogId('cli', `${client.firstName}-${client.lastName}`)
      });
    }
  });

  return { vehicles: fixture.vehicles.length, clients: fixture.clients.length };
}

export function readCatalogFixture(file: string): unknown {
  return JSON.parse(readFileSync(file, 'utf8'));
}
