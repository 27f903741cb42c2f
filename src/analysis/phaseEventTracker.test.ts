import test from 'node:test';
import assert from 'node:assert/strict';
import { PhaseEventTracker } from './phaseEventTracker.js';
import { EntityStore } from '../memory/entityStore.js';

function setup() {
  const store = new EntityStore('agent-test');
  for (const p of ['player1', 'player2', 'player3', 'Alice']) store.registerPlayer(p);
  return { store, tracker: new PhaseEventTracker(store) };
}

test('PhaseEventTracker: an elimination marks the player dead with one key event', () => {
  const { store, tracker } = setup();

  const updates = tracker.observeAnnouncement('player2 has been eliminated. They were a villager.');

  assert.deepEqual(updates, [{ kind: 'elimination', player: 'player2' }]);
  assert.equal(store.getPlayer('player2')?.status, 'dead');
  const events = store.self.snapshot().keyEvents;
  assert.equal(events.length, 1);
  assert.equal(events[0]?.type, 'elimination');
  assert.equal(events[0]?.details, 'player2 was eliminated');
  assert.deepEqual(events[0]?.players, ['player2']);
});

test('PhaseEventTracker: eliminated names resolve to the registered spelling', () => {
  const { store, tracker } = setup();

  tracker.observeAnnouncement('Alice has been eliminated.');

  assert.equal(store.getPlayer('Alice')?.status, 'dead');
});

test('PhaseEventTracker: the night phase advances the night and clears cycle flags', () => {
  const { store, tracker } = setup();
  store.markProtected('player1');
  store.markInvestigated('player3');

  const updates = tracker.observeAnnouncement('The night phase has begun.');

  assert.deepEqual(updates, [{ kind: 'night', nightCount: 1 }]);
  assert.equal(store.isNight, true);
  assert.equal(store.getPlayer('player1')?.protectedByDoctor, false);
  assert.equal(store.getPlayer('player3')?.investigatedBySeer, false);
  assert.equal(store.self.snapshot().keyEvents[0]?.details, 'Night phase began');
});

test('PhaseEventTracker: the day phase advances the day', () => {
  const { store, tracker } = setup();
  tracker.observeAnnouncement('The night phase has begun.');

  const updates = tracker.observeAnnouncement('The Day Phase has begun.');

  assert.deepEqual(updates, [{ kind: 'day', dayCount: 1 }]);
  assert.equal(store.isNight, false);
  assert.equal(store.nightCount, 1);
});

test('PhaseEventTracker: one announcement can fire every trigger', () => {
  const { store, tracker } = setup();

  const updates = tracker.observeAnnouncement('player1 has been eliminated. The day phase ends and the night phase begins.');

  assert.deepEqual(updates, [
    { kind: 'elimination', player: 'player1' },
    { kind: 'night', nightCount: 1 },
    { kind: 'day', dayCount: 1 },
  ]);
  assert.equal(store.isNight, false);
});

test('PhaseEventTracker: unrelated text changes nothing', () => {
  const { store, tracker } = setup();

  assert.deepEqual(tracker.observeAnnouncement('Please discuss.'), []);
  assert.equal(store.dayCount, 0);
  assert.equal(store.self.snapshot().keyEvents.length, 0);
});

test('PhaseEventTracker: a werewolf investigation result makes an enemy', () => {
  const { store, tracker } = setup();

  const result = tracker.observeInvestigationResult('player3 is a werewolf.');

  assert.deepEqual(result, { player: 'player3', role: 'werewolf' });
  assert.equal(store.getPlayer('player3')?.suspectedRole, 'werewolf');
  assert.equal(store.getPlayer('player3')?.investigatedBySeer, true);
  assert.equal(store.self.investigatedRoleOf('player3'), 'werewolf');
  assert.equal(store.self.snapshot().enemies.get('player3'), 'Revealed as a werewolf by my investigation');
});

test('PhaseEventTracker: a village investigation result builds trust', () => {
  const { store, tracker } = setup();

  assert.deepEqual(tracker.observeInvestigationResult('Alice is the wolf'), { player: 'Alice', role: 'werewolf' });
  assert.deepEqual(tracker.observeInvestigationResult('player1 is a villager'), { player: 'player1', role: 'villager' });
  assert.equal(store.self.trustOf('player1'), 0.8);
  assert.equal(store.self.snapshot().keyEvents.at(-1)?.details, 'player1 is a villager');
});

test('PhaseEventTracker: role assignment text is not an investigation result', () => {
  const { store, tracker } = setup();

  assert.equal(tracker.observeInvestigationResult('You are a seer in this game.'), null);
  assert.equal(store.self.snapshot().keyEvents.length, 0);
});
