import type { ClientRecord, MarketQuery, VehicleRecord } from '../types/domain.js';

/** Read-only view of the dealer inventory and client base. */
export type Catalog = {
  getVehicle(id: string): VehicleRecord | undefined;
  getClient(id: string): ClientRecord | undefined;
  listVehicles(filter?: { inStock?: boolean }): VehicleRecord[];
};

export function sameSegment(vehicle: VehicleRecord, query: MarketQuery): boolean {
  return (
    vehicle.make.toLowerCase() === query.make.toLowerCase() &&
    vehicle.model.toLowerCase() === query.model.toLowerCase() &&
    vehicle.year === query.year &&
    vehicle.fuel === query.fuel.toLowerCase()
  );
}

/**
 * First in-stock vehicle matching the client's fuel and transmission
 * preferences whose market value fits the budget.
 */
export function findSuitableVehicle(catalog: Catalog, client: ClientRecord): VehicleRecord | undefined {
  return catalog.listVehicles({ inStock: true }).find((vehicle) => {
    if (client.preferredFuel && vehicle.fuel !== client.preferredFuel) return false;
    if (client.preferredTransmission && vehicle.transmission !== client.preferredTransmission) return false;
    return vehicle.marketValue >= client.budgetMin && vehicle.marketValue <= client.budgetMax;
  });
}
