import { beforeEach, test } from 'node:test';
import assert from 'node:assert/strict';
import { openDatabase, type BetterSqlite3Database } from '../../src/db/index.js';
import { createOilRepository, type OilRepository } from '../../src/db/oilRepository.js';

let db: BetterSqlite3Database;
let repository: OilRepository;
let clock: Date;

beforeEach(() => {
  db = openDatabase(':memory:');
  clock = new Date('2024-03-01T10:00:00.000Z');
  repository = createOilRepository(db, () => clock);
});

function seed(count: number) {
  for (let i = 0; i < count; i += 1) {
    repository.create({
      date: `2024-01-${String(i + 1).padStart(2, '0')}`,
      price: 100 + i,
      type: 'DIESEL',
      userId: 'user-1',
      email: 'jan@example.com',
    });
  }
  return repository.getAll().map((oil) => oil.id);
}

test('migracje ustawiają wersję schematu', () => {
  assert.equal(db.pragma('user_version', { simple: true }), 1);
});

test('tworzy i odczytuje zasób', () => {
  const created = repository.create({
    date: '2024-02-29',
    price: 812.5,
    type: 'PETROL',
    oil_document_url: 'https://files.example.com/uploads/invoice.pdf',
    userId: 'user-1',
    email: 'jan@example.com',
  });

  assert.match(created.id, /^[0-9a-f-]{36}$/);
  assert.deepEqual(repository.get(created.id), {
    id: created.id,
    date: '2024-02-29',
    price: 812.5,
    type: 'PETROL',
    oil_document_url: 'https://files.example.com/uploads/invoice.pdf',
    userId: 'user-1',
    email: 'jan@example.com',
    created_at: '2024-03-01T10:00:00.000Z',
    updated_at: '2024-03-01T10:00:00.000Z',
  });
});

test('zwraca null dla nieistniejącego identyfikatora', () => {
  assert.equal(repository.get('00000000-0000-4000-8000-000000000000'), null);
});

test('filtruje po dacie i liczy rekordy', () => {
  seed(3);
  assert.equal(repository.count(), 3);
  const byDate = repository.getByDate('2024-01-02');
  assert.equal(byDate.length, 1);
  assert.equal(byDate[0]?.price, 101);
});

test('aktualizuje tylko przekazane pola', () => {
  const created = repository.create({ date: '2024-01-01', price: 10, type: 'GAS', userId: null, email: null });
  clock = new Date('2024-03-02T08:30:00.000Z');

  const updated = repository.update(created.id, { price: 12.75 });

  assert.ok(updated);
  assert.equal(updated.price, 12.75);
  assert.equal(updated.date, '2024-01-01');
  assert.equal(updated.type, 'GAS');
  assert.equal(updated.created_at, '2024-03-01T10:00:00.000Z');
  assert.equal(updated.updated_at, '2024-03-02T08:30:00.000Z');
});

test('pusta aktualizacja nie zmienia znacznika czasu', () => {
  const created = repository.create({ date: '2024-01-01', price: 10, type: 'GAS', userId: null, email: null });
  clock = new Date('2024-03-02T08:30:00.000Z');

  assert.deepEqual(repository.update(created.id, {}), created);
  assert.equal(repository.update('missing', { price: 1 }), null);
});

test('usuwa zasób i raportuje brak rekordu', () => {
  const created = repository.create({ date: '2024-01-01', price: 10, type: 'GAS', userId: null, email: null });
  assert.equal(repository.delete(created.id), true);
  assert.equal(repository.delete(created.id), false);
  assert.equal(repository.get(created.id), null);
});

test('baza odrzuca ujemną cenę', () => {
  assert.throws(() =>
    repository.create({ date: '2024-01-01', price: -1, type: 'GAS', userId: null, email: null }),
  );
});

test('stronicuje do przodu po identyfikatorze', () => {
  const ids = seed(5);

  const first = repository.page({ direction: 'next', size: 2 });
  assert.deepEqual(first.items.map((oil) => oil.id), ids.slice(0, 2));
  assert.equal(first.hasPrevious, false);
  assert.equal(first.hasNext, true);

  const second = repository.page({ direction: 'next', after: ids[1], size: 2 });
  assert.deepEqual(second.items.map((oil) => oil.id), ids.slice(2, 4));
  assert.equal(second.hasPrevious, true);
  assert.equal(second.hasNext, true);

  const last = repository.page({ direction: 'next', after: ids[3], size: 2 });
  assert.deepEqual(last.items.map((oil) => oil.id), ids.slice(4));
  assert.equal(last.hasPrevious, true);
  assert.equal(last.hasNext, false);
});

test('stronicuje wstecz po identyfikatorze', () => {
  const ids = seed(5);

  const previous = repository.page({ direction: 'prev', before: ids[4] ?? '', size: 2 });
  assert.deepEqual(previous.items.map((oil) => oil.id), ids.slice(2, 4));
  assert.equal(previous.hasPrevious, true);
  assert.equal(previous.hasNext, true);

  const first = repository.page({ direction: 'prev', before: ids[2] ?? '', size: 2 });
  assert.deepEqual(first.items.map((oil) => oil.id), ids.slice(0, 2));
  assert.equal(first.hasPrevious, false);
  assert.equal(first.hasNext, true);
});

test('pusta tabela daje pustą stronę', () => {
  assert.deepEqual(repository.page({ direction: 'next', size: 10 }), { items: [], hasPrevious: false, hasNext: false });
});
