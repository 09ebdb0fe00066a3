export interface ListingRecord {
  title: string;
  price: string;
  city: string;
  year: string;
  mileage: string;
  color: string;
  registered_in: string;
  fuel_type: string;
  engine_capacity: string;
  transmission: string;
  link: string;
}

export const LISTING_FIELDS = [
  'title',
  'price',
  'city',
  'year',
  'mileage',
  'color',
  'registered_in',
  'fuel_type',
  'engine_capacity',
  'transmission',
  'link',
] as const satisfies readonly (keyof ListingRecord)[];

// Values the structured data may carry either as a JSON number or as text.
export type FieldValue =
  | { kind: 'numeric'; value: number }
  | { kind: 'text'; value: string };

export interface ListingSpecs {
  mileage: string;
  color: string;
  registered_in: string;
  fuel_type: string;
  engine_capacity: string;
  transmission: string;
}

export interface PageResult {
  page: number;
  records: ListingRecord[];
  success: boolean;
  attempts: number;
}
