import test from 'node:test';
import assert from 'node:assert/strict';
import { SelfState, recentKeyEvents } from './selfState.js';

const at = new Date('2026-01-01T00:00:00Z');

test('SelfState: starts observing with nothing revealed', () => {
  const snapshot = new SelfState(() => at).snapshot();

  assert.equal(snapshot.strategy, 'observe');
  assert.equal(snapshot.roleRevealed, false);
  assert.equal(snapshot.keyEvents.length, 0);
});

test('SelfState: a repeat pick does not downgrade a known investigation result', () => {
  const self = new SelfState(() => at);

  self.recordInvestigation('player3');
  assert.equal(self.investigatedRoleOf('player3'), 'unknown');

  self.recordInvestigation('player3', 'werewolf');
  self.recordInvestigation('player3');
  assert.equal(self.investigatedRoleOf('player3'), 'werewolf');
});

test('SelfState: pack members are deduplicated', () => {
  const self = new SelfState(() => at);

  self.addPackMember('player2');
  self.addPackMember('player2');

  assert.deepEqual(self.snapshot().packMembers, ['player2']);
  assert.equal(self.isPackMember('player2'), true);
  assert.equal(self.isPackMember('player1'), false);
});

test('SelfState: trust and enmity are overwritten per player', () => {
  const self = new SelfState(() => at);

  self.setTrust('player1', 0.5);
  self.setTrust('player1', 0.8);
  self.setEnmity('player2', 'lied about voting');

  assert.equal(self.trustOf('player1'), 0.8);
  assert.equal(self.trustOf('player2'), undefined);
  assert.equal(self.snapshot().enemies.get('player2'), 'lied about voting');
});

test('SelfState: key events copy their player list', () => {
  const self = new SelfState(() => at);
  const players = ['player2'];

  self.recordKeyEvent('elimination', 'player2 was eliminated', players);
  players.push('player3');

  assert.deepEqual(self.snapshot().keyEvents, [
    { timestamp: at, type: 'elimination', details: 'player2 was eliminated', players: ['player2'] },
  ]);
});

test('recentKeyEvents: returns the last events in order', () => {
  const self = new SelfState(() => at);
  for (const n of [1, 2, 3, 4]) self.recordKeyEvent('phase_change', `event ${n}`);

  assert.deepEqual(
    recentKeyEvents(self.snapshot()).map(e => e.details),
    ['event 2', 'event 3', 'event 4']
  );
  assert.deepEqual(
    recentKeyEvents(self.snapshot(), 1).map(e => e.details),
    ['event 4']
  );
});

test('SelfState: behavioral notes accumulate per player', () => {
  const self = new SelfState(() => at);

  self.addBehavioralNote('player1', 'Voted for player2');
  self.addBehavioralNote('player1', 'Accused player3 of suspicious behavior');

  assert.deepEqual(self.notesFor('player1').map(n => n.observation), [
    'Voted for player2',
    'Accused player3 of suspicious behavior',
  ]);
  assert.deepEqual(self.notesFor('player2'), []);
});

test('SelfState: a vote justification is replaced by the latest one', () => {
  const self = new SelfState(() => at);

  self.recordVoteJustification('player2', 'quiet all day');
  self.recordVoteJustification('player2', 'defended a wolf');

  assert.equal(self.snapshot().voteJustifications.get('player2')?.justification, 'defended a wolf');
});
