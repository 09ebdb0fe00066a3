import * as fs from 'fs';
import * as path from 'path';
import { CsvListingRepository, toCsv } from '../../../src/infrastructure/repositories/CsvListingRepository';
import { makeRecord, makeTempDir } from '../../test-helpers';

const HEADER = 'title,price,city,year,mileage,color,registered_in,fuel_type,engine_capacity,transmission,link';

describe('toCsv', () => {
  it('writes the header and one row per record in field order', () => {
    const csv = toCsv([
      makeRecord({
        title: 'Toyota Corolla GLi',
        price: 'PKR 2,650,000',
        city: 'Lahore',
        year: '2015',
        mileage: '86,000 km',
        color: 'White',
        registered_in: 'Lahore',
        fuel_type: 'Petrol',
        engine_capacity: '1300 cc',
        transmission: 'Manual',
        link: 'https://example.com/corolla',
      }),
      makeRecord({ title: 'Suzuki Alto', price: 'Call for price' }),
    ]);

    expect(csv.split('\r\n')).toEqual([
      HEADER,
      'Toyota Corolla GLi,"PKR 2,650,000",Lahore,2015,"86,000 km",White,Lahore,Petrol,1300 cc,Manual,https://example.com/corolla',
      'Suzuki Alto,Call for price,,,,,,,,,',
      '',
    ]);
  });

  it('escapes embedded quotes', () => {
    const csv = toCsv([makeRecord({ title: 'Civic "Reborn"' })]);
    expect(csv).toBe(`${HEADER}\r\n"Civic ""Reborn""",,,,,,,,,,\r\n`);
  });

  it('writes only the header for an empty collection', () => {
    expect(toCsv([])).toBe(`${HEADER}\r\n`);
  });
});

describe('CsvListingRepository', () => {
  let outputDir: string;

  beforeEach(() => {
    outputDir = path.join(makeTempDir(), 'nested', 'output');
  });

  it('creates the output directory and returns the written path', async () => {
    const repository = new CsvListingRepository(outputDir);

    const file = await repository.save([makeRecord({ title: 'A' })], 'cars_final.csv');

    expect(file).toBe(path.join(outputDir, 'cars_final.csv'));
    expect(fs.readFileSync(file, 'utf8')).toBe(`${HEADER}\r\nA,,,,,,,,,,\r\n`);
  });

  it('overwrites an existing file with the full collection', async () => {
    const repository = new CsvListingRepository(outputDir);

    await repository.save([makeRecord({ title: 'A' }), makeRecord({ title: 'B' })], 'cars.csv');
    const file = await repository.save([makeRecord({ title: 'C' })], 'cars.csv');

    const lines = fs.readFileSync(file, 'utf8').trimEnd().split('\r\n');
    expect(lines).toEqual([HEADER, 'C,,,,,,,,,,']);
  });
});
