/**
 * Transaction bundle shape consumed by the external validator
 */

import type { Resource, ResourceType } from "./fhir.js";

export interface BundleRequest {
  method: "POST";
  url: ResourceType;
}

export interface BundleEntry {
  fullUrl: string;
  resource: Resource;
  request: BundleRequest;
}

export interface TransactionBundle {
  resourceType: "Bundle";
  id: string;
  type: "transaction";
  entry: BundleEntry[];
}
