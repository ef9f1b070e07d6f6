jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { WorkflowService } from '../../src/services/workflow.service';
import { ConversationState, Intent } from '../../src/types/conversation';
import { createConversationState } from '../../src/utils/conversationState';
import {
  CLARIFICATION_PROMPT,
  DEGRADED_SERVICE_NOTICE,
  STORE_FAILURE_REPLY,
  UNEXPECTED_ERROR_REPLY,
} from '../../src/utils/prompts';
import {
  makeReservation,
  MemoryReservationStore,
  mockAnswerer,
  mockClassifier,
  sequentialIds,
} from '../helpers/fakes';

const NOW = '2025-06-15T12:00:00.000Z';

function setup(intents: Intent[] = []) {
  const store = new MemoryReservationStore();
  const classifier = mockClassifier(...intents);
  const answerer = mockAnswerer();
  const workflow = new WorkflowService({
    classifier,
    answerer,
    store,
    generateId: sequentialIds(),
    now: () => new Date(NOW),
  });
  return { store, classifier, answerer, workflow };
}

async function run(workflow: WorkflowService, inputs: string[], start?: ConversationState) {
  let state = start ?? createConversationState('guest-1', new Date(NOW));
  const replies: string[] = [];
  for (const input of inputs) {
    const result = await workflow.processTurn(state, input);
    state = result.state;
    replies.push(result.reply);
  }
  return { state, replies };
}

const BOOKING_INPUTS = ['book a room', '2025-07-01', '2025-07-03', 'deluxe', '2'];

describe('WorkflowService', () => {
  describe('booking', () => {
    it('should collect every slot in order and create the reservation', async () => {
      const { workflow, store, classifier } = setup(['booking']);

      const { state, replies } = await run(workflow, BOOKING_INPUTS);

      expect(replies).toEqual([
        'Please provide check-in date (YYYY-MM-DD).',
        'Please provide check-out date (YYYY-MM-DD).',
        'Please choose a room type: standard, deluxe, suite.',
        'How many guests?',
        'Booking confirmed! Reservation ID: RSV-TEST0001. Room: deluxe, 2 guests, check-in 2025-07-01, check-out 2025-07-03.',
      ]);
      expect(state.stage).toEqual({ kind: 'COMPLETE' });
      expect(state.last_reservation_id).toBe('RSV-TEST0001');
      expect(classifier.classify).toHaveBeenCalledTimes(1);
      expect(classifier.classify).toHaveBeenCalledWith('book a room', []);

      expect(store.writes).toBe(1);
      expect(await store.get('RSV-TEST0001')).toEqual({
        id: 'RSV-TEST0001',
        guest_id: 'guest-1',
        check_in: '2025-07-01',
        check_out: '2025-07-03',
        room_type: 'deluxe',
        guests: 2,
        status: 'active',
        created_at: NOW,
        updated_at: NOW,
      });
    });

    it('should not write anything before the last slot is valid', async () => {
      const { workflow, store } = setup(['booking']);

      const { state } = await run(workflow, BOOKING_INPUTS.slice(0, 4));

      expect(state.stage).toEqual({ kind: 'COLLECTING_BOOKING_SLOT', slot: 3 });
      expect(state.collected_slots).toEqual({ check_in: '2025-07-01', check_out: '2025-07-03', room_type: 'deluxe' });
      expect(store.writes).toBe(0);
    });

    it('should re-ask the same slot until a valid date is given', async () => {
      const { workflow } = setup(['booking']);
      let { state } = await run(workflow, ['book a room']);

      for (const bad of ['2025-13-01', 'next friday', '2025-02-30', '01/07/2025']) {
        const result = await workflow.processTurn(state, bad);
        state = result.state;
        expect(state.stage).toEqual({ kind: 'COLLECTING_BOOKING_SLOT', slot: 0 });
        expect(result.reply).toBe(
          `"${bad}" is not a valid date. Please use the format YYYY-MM-DD. Please provide check-in date (YYYY-MM-DD).`
        );
      }

      const result = await workflow.processTurn(state, '2025-07-01');
      expect(result.state.stage).toEqual({ kind: 'COLLECTING_BOOKING_SLOT', slot: 1 });
      expect(result.reply).toBe('Please provide check-out date (YYYY-MM-DD).');
    });

    it('should reject a check-out date that is not after check-in', async () => {
      const { workflow } = setup(['booking']);
      let { state } = await run(workflow, ['book a room', '2025-07-01']);

      for (const bad of ['2025-07-01', '2025-06-30']) {
        const result = await workflow.processTurn(state, bad);
        state = result.state;
        expect(state.stage).toEqual({ kind: 'COLLECTING_BOOKING_SLOT', slot: 1 });
        expect(result.reply).toBe(
          'Check-out date must be after the check-in date (2025-07-01). Please provide check-out date (YYYY-MM-DD).'
        );
      }
      expect(state.collected_slots).toEqual({ check_in: '2025-07-01' });
    });

    it('should match room types case-insensitively and list options on a miss', async () => {
      const { workflow } = setup(['booking']);
      const { state } = await run(workflow, ['book a room', '2025-07-01', '2025-07-03']);

      const miss = await workflow.processTurn(state, 'penthouse');
      expect(miss.reply).toBe(
        '"penthouse" is not a room type we offer. Valid options: standard, deluxe, suite. Please choose a room type: standard, deluxe, suite.'
      );
      expect(miss.state.stage).toEqual({ kind: 'COLLECTING_BOOKING_SLOT', slot: 2 });

      const hit = await workflow.processTurn(miss.state, '  DeLuxe ');
      expect(hit.state.collected_slots.room_type).toBe('deluxe');
      expect(hit.state.stage).toEqual({ kind: 'COLLECTING_BOOKING_SLOT', slot: 3 });
    });

    it('should reject guest counts that are not positive integers', async () => {
      const { workflow, store } = setup(['booking']);
      let { state } = await run(workflow, BOOKING_INPUTS.slice(0, 4));

      for (const bad of ['0', '-1', 'two', '2.5', '']) {
        const result = await workflow.processTurn(state, bad);
        state = result.state;
        expect(state.stage).toEqual({ kind: 'COLLECTING_BOOKING_SLOT', slot: 3 });
        expect(result.reply).toBe('Please enter the number of guests as a whole number of at least 1. How many guests?');
      }
      expect(store.writes).toBe(0);
    });

    it('should reject more guests than the room holds', async () => {
      const { workflow } = setup(['booking']);
      const { state } = await run(workflow, ['book a room', '2025-07-01', '2025-07-03', 'standard']);

      const result = await workflow.processTurn(state, '3');

      expect(result.reply).toBe('A standard room holds up to 2 guests. Please enter a smaller number. How many guests?');
      expect(result.state.stage).toEqual({ kind: 'COLLECTING_BOOKING_SLOT', slot: 3 });
    });

    it('should give each booking in a session its own reservation', async () => {
      const { workflow, store, classifier } = setup(['booking', 'booking']);

      const { state } = await run(workflow, [
        ...BOOKING_INPUTS,
        'book another room',
        '2025-08-01',
        '2025-08-05',
        'suite',
        '4',
      ]);

      expect(state.stage).toEqual({ kind: 'COMPLETE' });
      expect(store.writes).toBe(2);
      const reservations = await store.list();
      expect(reservations.map((r) => r.id)).toEqual(['RSV-TEST0001', 'RSV-TEST0002']);
      expect(reservations.every((r) => r.status === 'active')).toBe(true);
      expect(reservations[1]).toMatchObject({ check_in: '2025-08-01', check_out: '2025-08-05', room_type: 'suite', guests: 4 });

      // History carries over the restart; slots do not.
      expect(state.history).toHaveLength(20);
      expect(state.collected_slots).toEqual({
        check_in: '2025-08-01',
        check_out: '2025-08-05',
        room_type: 'suite',
        guests: 4,
      });
      expect(classifier.classify).toHaveBeenCalledTimes(2);
      expect(classifier.classify.mock.calls[1][0]).toBe('book another room');
      expect(classifier.classify.mock.calls[1][1]).toHaveLength(10);
    });

    it('should stay on the last slot when the store write fails and finish on retry', async () => {
      const { workflow, store } = setup(['booking']);
      const { state } = await run(workflow, BOOKING_INPUTS.slice(0, 4));

      store.failNextWrite = true;
      const failed = await workflow.processTurn(state, '2');

      expect(failed.reply).toBe(STORE_FAILURE_REPLY);
      expect(failed.state.stage).toEqual({ kind: 'COLLECTING_BOOKING_SLOT', slot: 3 });
      expect(failed.state.collected_slots.guests).toBeUndefined();
      expect(store.records.size).toBe(0);

      const retried = await workflow.processTurn(failed.state, '2');

      expect(retried.state.stage).toEqual({ kind: 'COMPLETE' });
      expect(store.records.size).toBe(1);
      expect(store.writes).toBe(1);
    });
  });

  describe('rescheduling', () => {
    it('should reject an unknown reservation id and stay on the first slot', async () => {
      const { workflow, store } = setup(['rescheduling']);
      store.records.set('RSV-00000001', makeReservation());

      const { state, replies } = await run(workflow, ['I need to change my dates', 'RSV-NOPE']);

      expect(replies[1]).toBe('Reservation "RSV-NOPE" was not found. Please provide your reservation ID.');
      expect(state.stage).toEqual({ kind: 'COLLECTING_RESCHEDULE_SLOT', slot: 0 });
      expect(store.writes).toBe(0);
      expect(await store.get('RSV-00000001')).toEqual(makeReservation());
    });

    it('should treat a cancelled reservation as not found', async () => {
      const { workflow, store } = setup(['rescheduling']);
      store.records.set('RSV-00000001', makeReservation({ status: 'cancelled' }));

      const { state, replies } = await run(workflow, ['reschedule please', 'RSV-00000001']);

      expect(replies[1]).toBe('Reservation "RSV-00000001" was not found. Please provide your reservation ID.');
      expect(state.stage).toEqual({ kind: 'COLLECTING_RESCHEDULE_SLOT', slot: 0 });
    });

    it('should move the dates of an existing reservation', async () => {
      const { workflow, store } = setup(['rescheduling']);
      store.records.set('RSV-00000001', makeReservation());

      const { state, replies } = await run(workflow, [
        'I need to change my dates',
        ' RSV-00000001 ',
        '2025-09-01',
        '2025-09-04',
      ]);

      expect(replies).toEqual([
        'Please provide your reservation ID.',
        'Please provide new check-in date (YYYY-MM-DD).',
        'Please provide new check-out date (YYYY-MM-DD).',
        'Reservation updated successfully! Reservation ID: RSV-00000001. New check-in 2025-09-01, new check-out 2025-09-04.',
      ]);
      expect(state.stage).toEqual({ kind: 'COMPLETE' });
      expect(state.last_reservation_id).toBe('RSV-00000001');
      expect(store.writes).toBe(1);
      expect(await store.get('RSV-00000001')).toMatchObject({
        check_in: '2025-09-01',
        check_out: '2025-09-04',
        room_type: 'standard',
        guests: 1,
        status: 'active',
      });
    });

    it('should not move a reservation cancelled while the new dates were collected', async () => {
      const { workflow, store } = setup(['rescheduling']);
      store.records.set('RSV-00000001', makeReservation());

      const midway = await run(workflow, ['move my stay', 'RSV-00000001', '2025-09-01']);
      store.records.set('RSV-00000001', makeReservation({ status: 'cancelled' }));

      const result = await workflow.processTurn(midway.state, '2025-09-04');

      expect(result.reply).toBe('Reservation "RSV-00000001" was not found. Please provide your reservation ID.');
      expect(result.state.stage).toEqual({ kind: 'COLLECTING_RESCHEDULE_SLOT', slot: 0 });
      expect(result.state.collected_slots).toEqual({});
      expect(store.writes).toBe(0);
      expect(await store.get('RSV-00000001')).toEqual(makeReservation({ status: 'cancelled' }));
    });

    it('should require the new check-out to follow the new check-in', async () => {
      const { workflow, store } = setup(['rescheduling']);
      store.records.set('RSV-00000001', makeReservation());

      const { state, replies } = await run(workflow, ['move my stay', 'RSV-00000001', '2025-09-04', '2025-09-01']);

      expect(replies[3]).toBe(
        'Check-out date must be after the check-in date (2025-09-04). Please provide new check-out date (YYYY-MM-DD).'
      );
      expect(state.stage).toEqual({ kind: 'COLLECTING_RESCHEDULE_SLOT', slot: 2 });
      expect(store.writes).toBe(0);
    });
  });

  describe('questions and unclear requests', () => {
    it('should answer a question once and complete without writing', async () => {
      const { workflow, store, answerer } = setup(['question']);

      const result = await workflow.processTurn(createConversationState('guest-1'), 'what time is checkout?');

      expect(answerer.answer).toHaveBeenCalledTimes(1);
      expect(answerer.answer).toHaveBeenCalledWith('what time is checkout?');
      expect(result.reply).toBe('Check-out is by 11:00 AM.');
      expect(result.state.stage).toEqual({ kind: 'COMPLETE' });
      expect(result.state.history.map((entry) => [entry.role, entry.text])).toEqual([
        ['user', 'what time is checkout?'],
        ['agent', 'Check-out is by 11:00 AM.'],
      ]);
      expect(store.writes).toBe(0);
    });

    it('should ask for clarification and keep waiting for an intent', async () => {
      const { workflow } = setup(['unknown']);

      const result = await workflow.processTurn(createConversationState('guest-1'), 'hmm');

      expect(result.reply).toBe(CLARIFICATION_PROMPT);
      expect(result.state.stage).toEqual({ kind: 'AWAITING_INTENT' });
      expect(result.state.pending_intent).toBe('unknown');
    });

    it('should tell the guest when classification is degraded', async () => {
      const { workflow, classifier } = setup();
      classifier.classify.mockResolvedValueOnce({ intent: 'unknown', degraded: true });

      const result = await workflow.processTurn(createConversationState('guest-1'), 'book a room');

      expect(result.reply).toBe(`${DEGRADED_SERVICE_NOTICE} ${CLARIFICATION_PROMPT}`);
      expect(result.state.stage).toEqual({ kind: 'AWAITING_INTENT' });
    });
  });

  describe('errors and state handling', () => {
    it('should move to ERROR on an unexpected failure and restart on the next message', async () => {
      const { workflow, classifier } = setup();
      classifier.classify
        .mockRejectedValueOnce(new Error('boom'))
        .mockResolvedValueOnce({ intent: 'booking', degraded: false });

      const failed = await workflow.processTurn(createConversationState('guest-1'), 'book a room');
      expect(failed.reply).toBe(UNEXPECTED_ERROR_REPLY);
      expect(failed.state.stage).toEqual({ kind: 'ERROR' });

      const restarted = await workflow.processTurn(failed.state, 'book a room');
      expect(restarted.state.stage).toEqual({ kind: 'COLLECTING_BOOKING_SLOT', slot: 0 });
      expect(restarted.state.history).toHaveLength(4);
    });

    it('should treat a stray ANSWERING_QUESTION stage as a new request', async () => {
      const { workflow, classifier } = setup(['booking']);
      const stray: ConversationState = {
        ...createConversationState('guest-1', new Date(NOW)),
        stage: { kind: 'ANSWERING_QUESTION' },
      };

      const result = await workflow.processTurn(stray, 'book a room');

      expect(classifier.classify).toHaveBeenCalledWith('book a room', []);
      expect(result.reply).toBe('Please provide check-in date (YYYY-MM-DD).');
      expect(result.state.stage).toEqual({ kind: 'COLLECTING_BOOKING_SLOT', slot: 0 });
    });

    it('should leave the state it was given untouched', async () => {
      const { workflow } = setup(['booking']);
      const before = createConversationState('guest-1', new Date(NOW));
      const snapshot = JSON.stringify(before);

      const result = await workflow.processTurn(before, 'book a room');

      expect(JSON.stringify(before)).toBe(snapshot);
      expect(result.state).not.toBe(before);
    });
  });
});
