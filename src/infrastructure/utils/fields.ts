import { FieldValue } from '../../domain/entities/Listing.js';
import { KNOWN_CITIES } from '../../config/cities.config.js';

const ENGINE_DELIMITER = ' . ';
const priceFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 20 });

export function toFieldValue(raw: unknown): FieldValue {
  if (typeof raw === 'number' && Number.isFinite(raw)) {
    return { kind: 'numeric', value: raw };
  }
  if (raw === undefined || raw === null) {
    return { kind: 'text', value: '' };
  }
  return { kind: 'text', value: typeof raw === 'string' ? raw : String(raw) };
}

export function formatYear(year: FieldValue): string {
  return year.kind === 'numeric' ? String(year.value) : year.value;
}

export function formatPrice(price: FieldValue, currency: string): string {
  return price.kind === 'numeric' ? `${currency} ${priceFormat.format(price.value)}` : price.value;
}

export function extractCity(description: string): string {
  const haystack = description.toLowerCase();
  const city = KNOWN_CITIES.find((name) => haystack.includes(name));
  return city ? toTitleCase(city) : '';
}

export function parseEngineSpecs(text: string): {
  fuel_type: string;
  engine_capacity: string;
  transmission: string;
} {
  const [fuel = '', capacity = '', transmission = ''] = text
    .split(ENGINE_DELIMITER)
    .map((part) => part.trim());

  return { fuel_type: fuel, engine_capacity: capacity, transmission };
}

function toTitleCase(value: string): string {
  return value.replace(/\b\w/g, (char) => char.toUpperCase());
}
