import test from 'node:test';
import assert from 'node:assert/strict';
import { EntityStore } from './entityStore.js';

function storeWith(...players: string[]) {
  const store = new EntityStore('agent-test', { observerNames: ['moderator'] });
  for (const p of players) store.registerPlayer(p);
  return store;
}

test('EntityStore: self is never registered and duplicates are ignored', () => {
  const store = storeWith('agent-test', 'player1', 'player1');

  assert.deepEqual(store.allPlayers().map(p => p.name), ['player1']);
  assert.equal(store.hasPlayer('agent-test'), false);
});

test('EntityStore: observers keep their claims but stay out of the rankings', () => {
  const store = storeWith('moderator', 'player1', 'player2');
  store.recordClaim('moderator', 'The day phase has begun.', 'play-arena');
  store.adjustSuspicion('moderator', 5);
  store.markProtected('moderator');
  store.markInvestigated('moderator');

  assert.equal(store.hasPlayer('moderator'), true);
  assert.equal(store.isObserver('moderator'), true);
  assert.equal(store.isObserver('player1'), false);
  assert.deepEqual(store.claimsOf('moderator').map(c => c.content), ['The day phase has begun.']);
  assert.deepEqual(store.aliveOrdered(), ['player1', 'player2']);
  assert.deepEqual(store.topSuspicious(3), ['player1', 'player2']);
  assert.equal(store.getPlayer('moderator')?.protectedByDoctor, false);
  assert.equal(store.getPlayer('moderator')?.investigatedBySeer, false);
});

test('EntityStore: a new player starts alive, unknown and unsuspected', () => {
  const store = storeWith('player1');

  assert.deepEqual(store.getPlayer('player1'), {
    name: 'player1',
    suspectedRole: 'unknown',
    status: 'alive',
    claims: [],
    votesCast: [],
    votesReceived: [],
    suspicionScore: 0,
    protectedByDoctor: false,
    investigatedBySeer: false,
  });
});

test('EntityStore: vote halves are recorded independently', () => {
  const store = storeWith('player1');

  store.recordVote('player1', 'ghost');
  store.recordVote('ghost', 'player1');

  assert.deepEqual(store.getPlayer('player1')?.votesCast, ['ghost']);
  assert.deepEqual(store.getPlayer('player1')?.votesReceived, ['ghost']);
  assert.equal(store.hasPlayer('ghost'), false);
});

test('EntityStore: topSuspicious skips the dead and keeps first-seen order on ties', () => {
  const store = storeWith('player1', 'player2', 'player3', 'player4');
  store.adjustSuspicion('player3', 0.4);
  store.adjustSuspicion('player1', 0.9);
  store.markDead('player1');

  assert.deepEqual(store.topSuspicious(3), ['player3', 'player2', 'player4']);
  assert.deepEqual(store.topSuspicious(0), []);
});

test('EntityStore: multiplySuspicion leaves a zero score at zero', () => {
  const store = storeWith('player1', 'player2');
  store.adjustSuspicion('player2', 0.5);

  store.multiplySuspicion('player1', 2);
  store.multiplySuspicion('player2', 2);

  assert.equal(store.getPlayer('player1')?.suspicionScore, 0);
  assert.equal(store.getPlayer('player2')?.suspicionScore, 1);
});

test('EntityStore: operations on unknown players are no-ops', () => {
  const store = storeWith();

  store.recordClaim('ghost', 'hello', 'play-arena');
  store.markDead('ghost');
  store.adjustSuspicion('ghost', 1);
  store.markProtected('ghost');

  assert.deepEqual(store.claimsOf('ghost'), []);
  assert.deepEqual(store.allPlayers(), []);
});

test('EntityStore: assignRole only succeeds once', () => {
  const store = storeWith();

  assert.equal(store.myRole, 'unknown');
  assert.equal(store.assignRole('seer'), true);
  assert.equal(store.assignRole('werewolf'), false);
  assert.equal(store.myRole, 'seer');
});

test('EntityStore: resolveName maps lowercased tokens to the registered spelling', () => {
  const store = storeWith('Alice');

  assert.equal(store.resolveName('alice'), 'Alice');
  assert.equal(store.resolveName('ALICE'), 'Alice');
  assert.equal(store.resolveName('bob'), 'bob');
});

test('EntityStore: resetCycleFlags clears protection and investigation marks', () => {
  const store = storeWith('player1');
  store.markProtected('player1');
  store.markInvestigated('player1');

  store.resetCycleFlags();

  assert.equal(store.getPlayer('player1')?.protectedByDoctor, false);
  assert.equal(store.getPlayer('player1')?.investigatedBySeer, false);
});

test('EntityStore: claims keep arrival order and the injected clock', () => {
  const at = new Date('2026-01-01T00:00:00Z');
  const store = new EntityStore('agent-test', { now: () => at });
  store.registerPlayer('player1');

  store.recordClaim('player1', 'first', 'play-arena');
  store.recordClaim('player1', 'second', 'direct');

  assert.deepEqual(store.claimsOf('player1'), [
    { timestamp: at, content: 'first', channel: 'play-arena' },
    { timestamp: at, content: 'second', channel: 'direct' },
  ]);
});
