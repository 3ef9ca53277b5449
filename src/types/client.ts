import type { RawResource } from './resources';

export type CallOptions = {
  signal?: AbortSignal;
};

/**
 * Read-only view of the cloud platform consumed by the inventory engine.
 *
 * Listing calls resolve to raw resources in platform order. Detail calls
 * resolve to null when the id is unknown. Any other failure rejects with a
 * ServiceError tagged with the resource kind.
 */
export interface CloudResourceClient {
  listServers(options?: CallOptions): Promise<RawResource[]>;
  listHypervisors(options?: CallOptions): Promise<RawResource[]>;
  listFlavors(options?: CallOptions): Promise<RawResource[]>;
  listImages(options?: CallOptions): Promise<RawResource[]>;
  listVolumes(options?: CallOptions): Promise<RawResource[]>;
  listVolumeTypes(options?: CallOptions): Promise<RawResource[]>;
  listNetworks(options?: CallOptions): Promise<RawResource[]>;
  listSubnets(options?: CallOptions): Promise<RawResource[]>;
  listRouters(options?: CallOptions): Promise<RawResource[]>;

  getServerDetails(id: string, options?: CallOptions): Promise<RawResource | null>;
  getFlavorDetails(id: string, options?: CallOptions): Promise<RawResource | null>;
  getImageDetails(id: string, options?: CallOptions): Promise<RawResource | null>;
}
