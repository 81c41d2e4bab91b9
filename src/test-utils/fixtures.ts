/**
 * A small clickstream: nine sessions across Poland (5), Germany (3) and
 * France (1), 19 clicks in April and May 2008.
 */

export interface ClickFixture {
  day: string;
  session_id: number;
  country: string;
  category: string | null;
  model: string | null;
  price: number | null;
}

const click = (
  day: string,
  session_id: number,
  country: string,
  category: string | null,
  model: string | null,
  price: number | null
): ClickFixture => ({ day, session_id, country, category, model, price });

export const CLICKS: ClickFixture[] = [
  click('2008-04-01', 1, 'Poland', 'trousers', 'A1', 28),
  click('2008-04-01', 1, 'Poland', 'trousers', 'A2', 33),
  click('2008-04-01', 1, 'Poland', 'skirts', 'B1', 52),
  click('2008-04-01', 2, 'Poland', 'blouses', 'C1', 0),
  click('2008-04-02', 3, 'Poland', 'trousers', 'A1', 28),
  click('2008-04-02', 3, 'Poland', 'trousers', 'A1', 28),
  click('2008-04-02', 4, 'Poland', null, null, null),
  click('2008-05-01', 5, 'Poland', 'skirts', 'B1', 52),
  click('2008-05-01', 5, 'Poland', 'blouses', 'C1', 38),
  click('2008-04-01', 6, 'Germany', 'trousers', 'A2', 33),
  click('2008-04-01', 6, 'Germany', 'skirts', 'B2', 110),
  click('2008-04-02', 7, 'Germany', 'skirts', 'B2', 110),
  click('2008-05-01', 8, 'Germany', 'blouses', 'C1', 38),
  click('2008-05-01', 8, 'Germany', 'blouses', 'C1', 38),
  click('2008-05-01', 8, 'Germany', 'blouses', 'C2', 160),
  click('2008-05-01', 8, 'Germany', 'trousers', 'A1', 28),
  click('2008-05-01', 8, 'Germany', 'skirts', 'B1', 52),
  click('2008-05-01', 8, 'Germany', 'trousers', 'A3', 75),
  click('2008-04-01', 9, 'France', 'trousers', 'A1', 28),
];

export const SALES_ROWS = [
  { region: 'north', quarter: 'Q1', revenue: 10, orders: 2 },
  { region: 'north', quarter: 'Q2', revenue: 15, orders: 3 },
  { region: 'south', quarter: 'Q1', revenue: 7, orders: 1 },
  { region: 'south', quarter: 'Q1', revenue: 3, orders: 1 },
];
