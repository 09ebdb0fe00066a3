import * as cheerio from 'cheerio';
import { ListingRecord, ListingSpecs } from '../../domain/entities/Listing.js';
import { ILogger, LoggerFactory } from '../logging/Logger.js';
import { extractCity, formatPrice, formatYear, parseEngineSpecs, toFieldValue } from '../utils/fields.js';

export interface ExtractorSelectors {
  listing: string;
  structuredData: string;
  specs: string;
}

export const PAKWHEELS_SELECTORS: ExtractorSelectors = {
  listing: 'ul.search-results li.classified-listing',
  structuredData: 'script[type="application/ld+json"]',
  specs: 'ul.ad-specs',
};

export interface SpecItem {
  classes: string[];
  text: string;
}

type SpecField = 'mileage' | 'color' | 'registered_in' | 'engine';

// Order matters: an item is assigned to the first token its icon matches.
const SPEC_ICONS: ReadonlyArray<[token: string, field: SpecField]> = [
  ['pw-mileage', 'mileage'],
  ['pw-color', 'color'],
  ['pw-registration', 'registered_in'],
  ['pw-engine', 'engine'],
];

const DEFAULT_CURRENCY = 'PKR';

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(source: JsonObject, key: string): string {
  const value = source[key];
  return typeof value === 'string' ? value.trim() : '';
}

export class ListingExtractor {
  private readonly logger: ILogger;

  constructor(private readonly selectors: ExtractorSelectors = PAKWHEELS_SELECTORS) {
    this.logger = LoggerFactory.create('ListingExtractor');
  }

  extract(html: string): ListingRecord[] {
    const $ = cheerio.load(html);
    const records: ListingRecord[] = [];

    $(this.selectors.listing).each((index, element) => {
      const item = $(element);
      const data = this.parseStructuredData(item.find(this.selectors.structuredData).first().text(), index);
      if (!data) return;

      const specItems = item
        .find(this.selectors.specs)
        .first()
        .find('li')
        .map((_, li) => ({
          classes: ($(li).find('i').first().attr('class') ?? '').split(/\s+/).filter(Boolean),
          text: $(li).text().replace(/\s+/g, ' ').trim(),
        }))
        .get();

      records.push(this.toRecord(data, this.classifySpecs(specItems)));
    });

    return records;
  }

  classifySpecs(items: SpecItem[]): ListingSpecs {
    const specs: ListingSpecs = {
      mileage: '',
      color: '',
      registered_in: '',
      fuel_type: '',
      engine_capacity: '',
      transmission: '',
    };

    for (const item of items) {
      const match = SPEC_ICONS.find(([token]) => item.classes.some((c) => c.includes(token)));
      if (!match) continue;

      const field = match[1];
      if (field === 'engine') {
        Object.assign(specs, parseEngineSpecs(item.text));
      } else {
        specs[field] = item.text;
      }
    }

    return specs;
  }

  private parseStructuredData(raw: string, index: number): JsonObject | null {
    if (!raw.trim()) {
      this.logger.debug('Listing has no structured data, skipping', { index });
      return null;
    }

    try {
      const parsed: unknown = JSON.parse(raw);
      if (isJsonObject(parsed)) return parsed;
      this.logger.debug('Structured data is not an object, skipping', { index });
    } catch {
      this.logger.debug('Failed to parse structured data JSON, skipping', { index });
    }
    return null;
  }

  private toRecord(data: JsonObject, specs: ListingSpecs): ListingRecord {
    const offers: JsonObject = isJsonObject(data.offers) ? data.offers : {};
    const currency = typeof offers.priceCurrency === 'string' ? offers.priceCurrency : DEFAULT_CURRENCY;

    return {
      title: readString(data, 'name'),
      price: formatPrice(toFieldValue(offers.price), currency),
      city: extractCity(readString(data, 'description')),
      year: formatYear(toFieldValue(data.modelDate)),
      mileage: specs.mileage,
      color: specs.color,
      registered_in: specs.registered_in,
      fuel_type: specs.fuel_type,
      engine_capacity: specs.engine_capacity,
      transmission: specs.transmission,
      link: typeof offers.url === 'string' ? offers.url : '',
    };
  }
}
