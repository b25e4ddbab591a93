/**
 * Catalog product as exposed over HTTP.
 *
 * `rating` is derived state: the mean of the product's active review
 * ratings, written by the reviews service, or null when it has none.
 */
export interface Product {
  id: string;
  name: string;
  description: string;
  developer: string;
  category: string;
  price: number;
  version: string;
  rating: number | null;
  download_count: number;
  icon_url: string | null;
  screenshots: string[];
  tags: string[];
  created_at: Date;
  updated_at: Date;
}

export interface ProductPage {
  products: Product[];
  total: number;
  page: number;
  page_size: number;
  total_pages: number;
}
