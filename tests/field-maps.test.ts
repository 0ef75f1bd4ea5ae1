import { describe, it, expect } from 'vitest';
import { DataParseError } from '../src/core/errors.js';
import { loadFieldMaps, parseFieldMaps } from '../src/providers/field-maps.js';

const table = {
  income: { operating_income: ['OperatingIncome'] },
  balance: { total_assets: ['TotalAssets'] },
};

describe('parseFieldMaps', () => {
  it('accepts a table per provider and freezes it', () => {
    const maps = parseFieldMaps({ polygon: table, yahoo: table, alphavantage: table });

    expect(maps.yahoo.income.operating_income).toEqual(['OperatingIncome']);
    expect(Object.isFrozen(maps)).toBe(true);
    expect(Object.isFrozen(maps.yahoo.balance)).toBe(true);
    expect(Object.isFrozen(maps.yahoo.balance.total_assets)).toBe(true);
  });

  it('rejects a canonical field that does not exist', () => {
    const bad = { ...table, income: { operating_profit: ['OperatingIncome'] } };
    expect(() => parseFieldMaps({ polygon: bad, yahoo: table, alphavantage: table }, 'test.json')).toThrow(DataParseError);
  });

  it('rejects an empty list of native names', () => {
    const bad = { ...table, balance: { total_assets: [] } };
    expect(() => parseFieldMaps({ polygon: table, yahoo: bad, alphavantage: table })).toThrow(/^Invalid field map: yahoo\.balance\.total_assets/);
  });

  it('rejects a missing provider', () => {
    expect(() => parseFieldMaps({ polygon: table, yahoo: table })).toThrow(DataParseError);
  });
});

describe('loadFieldMaps', () => {
  it('loads the bundled tables once', () => {
    const maps = loadFieldMaps();
    expect(loadFieldMaps()).toBe(maps);
    expect(maps.polygon.income.operating_income).toEqual(['operating_income_loss']);
    expect(maps.alphavantage.balance.total_assets?.length).toBeGreaterThan(0);
  });

  it('keeps a single native name where the provider reports one figure', () => {
    const maps = loadFieldMaps();
    expect(maps.polygon.income.net_income).toEqual(['net_income_loss']);
    expect(maps.polygon.balance.equity).toEqual(['equity']);
    expect(maps.yahoo.income.revenues).toEqual(['TotalRevenue']);
    expect(maps.yahoo.income.ebitda).toEqual(['EBITDA']);
    expect(maps.alphavantage.income.cost_of_revenue).toEqual(['costOfRevenue']);
    expect(maps.alphavantage.balance.cash_and_equivalents).toEqual(['cashAndCashEquivalentsAtCarryingValue']);
  });
});
