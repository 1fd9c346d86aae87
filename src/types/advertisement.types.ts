export interface Advertisement {
  id: number;
  title: string;
  description: string;
  price: number;
  ownerId: number;
  createdAt: Date;
}

export type AdvertisementRow = {
  id: number;
  title: string;
  description: string;
  price: number | string;
  owner_id: number;
  created_at: Date;
};

export interface AdvertisementResponse {
  id: number;
  title: string;
  description: string;
  price: number;
  owner_id: number;
  created_at: Date;
}

export interface CreateAdvertisementInput {
  title: string;
  description: string;
  price: number;
}

export interface UpdateAdvertisementInput {
  title?: string;
  description?: string;
  price?: number;
}

export interface AdvertisementSearchFilters {
  title?: string;
  description?: string;
  minPrice?: number;
  maxPrice?: number;
}

/**
 * Query string accepted by GET /advertisement
 */
export interface AdvertisementSearchQuery {
  title?: string;
  description?: string;
  min_price?: number;
  max_price?: number;
  offset?: number;
  limit?: number;
}
