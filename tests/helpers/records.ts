import type { TabularData } from '../../src/io/tabular.js';
import { knownRawColumns } from '../../src/schema/columns.js';
import type { RawRecord, RawValue } from '../../src/services/transformer.js';

const BASE_RECORD: Readonly<Record<string, RawValue>> = {
  Property_Title: 'Maple Court Duplex',
  Address: '12 Maple Ct, Springfield, IL 62701',
  Market: 'Springfield',
  Flood: 'Minimal Flood',
  Street_Address: '12 Maple Ct',
  City: 'Springfield',
  State: 'IL',
  Zip: '62701',
  Property_Type: 'Duplex',
  Highway: 'Far',
  Train: 'Near',
  Tax_Rate: '1.2',
  SQFT_Basement: '400',
  HTW: 'Yes',
  Pool: 'No',
  Commercial: 'No',
  Water: 'City',
  Sewage: 'Septic',
  Year_Built: '1978',
  SQFT_MU: '0',
  SQFT_Total: '1850',
  Parking: 'Garage',
  Bed: '3',
  Bath: '2',
  BasementYesNo: 'Yes',
  Layout: 'Split',
  Rent_Restricted: 'No',
  Neighborhood_Rating: 'B',
  Latitude: '39.78',
  Longitude: '-89.65',
  Subdivision: 'Oak Hills',
  School_Average: '6.5',
  Reviewed_Status: 'Reviewed',
  Most_Recent_Status: 'Open',
  Source: 'Referral',
  Occupancy: 'Tenant',
  Net_Yield: '6.1',
  IRR: '11.4',
  Selling_Reason: 'Relocation',
  Seller_Retained_Broker: 'No',
  Final_Reviewer: 'Reviewer A',
  Previous_Rent: '1200',
  List_Price: '185000',
  Zestimate: '190000',
  ARV: '210000',
  Expected_Rent: '1450',
  Rent_Zestimate: '1400',
  Low_FMR: '1100',
  High_FMR: '1500',
  Redfin_Value: '188000',
  Underwriting_Rehab: '15000',
  Rehab_Calculation: 'Yes',
  Paint: 'Yes',
  Flooring_Flag: 'True',
  Foundation_Flag: 'False',
  Roof_Flag: 'No',
  HVAC_Flag: 'Yes',
  Kitchen_Flag: 'No',
  Bathroom_Flag: 'Yes',
  Appliances_Flag: 'No',
  Windows_Flag: 'No',
  Landscaping_Flag: 'Yes',
  Trashout_Flag: 'No',
  HOA: '150',
  HOA_Flag: 'Yes',
  Taxes: '2400',
};

export function makeRawRecord(overrides: Record<string, RawValue> = {}): RawRecord {
  return { ...BASE_RECORD, ...overrides };
}

export function makeRawRecords(count: number): RawRecord[] {
  return Array.from({ length: count }, (_, index) =>
    makeRawRecord({ Property_Title: `Listing ${index + 1}`, Zip: String(62701 + index) })
  );
}

export function rawTable(rows: readonly RawRecord[], columns: string[] = knownRawColumns()): TabularData {
  return { columns, rows: [...rows] };
}

export function tabular(columns: string[], rows: readonly RawRecord[]): TabularData {
  return { columns, rows: [...rows] };
}
