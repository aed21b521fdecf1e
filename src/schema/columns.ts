export const TABLE_NAMES = ['property', 'leads', 'valuation', 'rehab', 'hoa', 'taxes'] as const;
export type TableName = (typeof TABLE_NAMES)[number];

export const SATELLITE_TABLES = ['leads', 'valuation', 'rehab', 'hoa', 'taxes'] as const satisfies readonly TableName[];
export type SatelliteTable = (typeof SATELLITE_TABLES)[number];

export type StorageKind = 'text' | 'number' | 'binary';
export type Coercion = 'passthrough' | 'categorical' | 'flag';

export type ColumnSpec = {
  name: string;
  kind: StorageKind;
  coercion: Coercion;
};

export type BinaryValue = 0 | 1;
export type CategoryMap = Readonly<Record<string, BinaryValue>>;

const YES_NO: CategoryMap = { yes: 1, no: 0 };
const NEAR_FAR: CategoryMap = { near: 1, far: 0 };

// Keys are matched after trim + lower-case; anything else is unmapped.
export const CATEGORY_MAPS: Readonly<Record<string, CategoryMap>> = {
  Flood: { 'minimal flood': 1, 'flood zone': 0 },
  Highway: NEAR_FAR,
  Train: NEAR_FAR,
  HTW: YES_NO,
  Pool: YES_NO,
  Commercial: YES_NO,
  Water: { city: 1, well: 0 },
  Sewage: { city: 1, septic: 0 },
  BasementYesNo: YES_NO,
  Rent_Restricted: YES_NO,
};

export const FLAG_TRUTHY_VALUES: ReadonlySet<string> = new Set(['yes', 'true', '1', 'minimal flood', 'no flooding']);

// Text markers the extract uses for an absent value, matched after trim + lower-case.
export const MISSING_VALUE_TOKENS: ReadonlySet<string> = new Set([
  'nan',
  '-nan',
  'na',
  'n/a',
  '#n/a',
  '#n/a n/a',
  '#na',
  '<na>',
  'null',
  'none',
  '-1.#ind',
  '-1.#qnan',
  '1.#ind',
  '1.#qnan',
]);

const text = (name: string): ColumnSpec => ({ name, kind: 'text', coercion: 'passthrough' });
const number = (name: string): ColumnSpec => ({ name, kind: 'number', coercion: 'passthrough' });
const categorical = (name: string): ColumnSpec => ({ name, kind: 'binary', coercion: 'categorical' });
const flag = (name: string): ColumnSpec => ({ name, kind: 'binary', coercion: 'flag' });

// Order is the positional contract of each table's insert statement.
export const TABLE_COLUMNS: Readonly<Record<TableName, readonly ColumnSpec[]>> = {
  property: [
    text('Property_Title'),
    text('Address'),
    text('Market'),
    categorical('Flood'),
    text('Street_Address'),
    text('City'),
    text('State'),
    text('Zip'),
    text('Property_Type'),
    categorical('Highway'),
    categorical('Train'),
    number('Tax_Rate'),
    number('SQFT_Basement'),
    categorical('HTW'),
    categorical('Pool'),
    categorical('Commercial'),
    categorical('Water'),
    categorical('Sewage'),
    number('Year_Built'),
    number('SQFT_MU'),
    number('SQFT_Total'),
    text('Parking'),
    number('Bed'),
    number('Bath'),
    categorical('BasementYesNo'),
    text('Layout'),
    categorical('Rent_Restricted'),
    text('Neighborhood_Rating'),
    number('Latitude'),
    number('Longitude'),
    text('Subdivision'),
    number('School_Average'),
  ],
  leads: [
    text('Reviewed_Status'),
    text('Most_Recent_Status'),
    text('Source'),
    text('Occupancy'),
    number('Net_Yield'),
    number('IRR'),
    text('Selling_Reason'),
    text('Seller_Retained_Broker'),
    text('Final_Reviewer'),
  ],
  valuation: [
    number('Previous_Rent'),
    number('List_Price'),
    number('Zestimate'),
    number('ARV'),
    number('Expected_Rent'),
    number('Rent_Zestimate'),
    number('Low_FMR'),
    number('High_FMR'),
    number('Redfin_Value'),
  ],
  rehab: [
    number('Underwriting_Rehab'),
    flag('Rehab_Calculation'),
    flag('Paint'),
    flag('Flooring_Flag'),
    flag('Foundation_Flag'),
    flag('Roof_Flag'),
    flag('HVAC_Flag'),
    flag('Kitchen_Flag'),
    flag('Bathroom_Flag'),
    flag('Appliances_Flag'),
    flag('Windows_Flag'),
    flag('Landscaping_Flag'),
    flag('Trashout_Flag'),
  ],
  hoa: [text('HOA'), flag('HOA_Flag')],
  taxes: [number('Taxes')],
};

export function tableColumns(table: TableName): readonly ColumnSpec[] {
  return TABLE_COLUMNS[table];
}

export function columnNames(table: TableName): string[] {
  return tableColumns(table).map((column) => column.name);
}

export function knownRawColumns(): string[] {
  return TABLE_NAMES.flatMap((table) => columnNames(table));
}

export function findColumn(name: string): { table: TableName; column: ColumnSpec } | null {
  for (const table of TABLE_NAMES) {
    const column = tableColumns(table).find((candidate) => candidate.name === name);
    if (column) return { table, column };
  }
  return null;
}

export function columnIdentifier(name: string): string {
  return name.toLowerCase();
}
