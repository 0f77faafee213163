export const OIL_TYPES = ['PETROL', 'DIESEL', 'GAS'] as const;

export type OilType = (typeof OIL_TYPES)[number];

export interface OilResource {
  id: string;
  /** Calendar date of the price record, `YYYY-MM-DD`. */
  date: string;
  price: number;
  type: OilType;
  oil_document_url: string | null;
  userId: string | null;
  email: string | null;
  created_at: string;
  updated_at: string;
}

export interface OilResourceInput {
  date: string;
  price: number;
  type: OilType;
  oil_document_url?: string | null;
}

export interface OilResourceCreateInput extends OilResourceInput {
  userId: string | null;
  email: string | null;
}

export type OilResourcePatch = Partial<OilResourceInput>;

export interface CursorPage<T> {
  items: T[];
  total: number;
  current_page: string | null;
  previous_page: string | null;
  next_page: string | null;
}
