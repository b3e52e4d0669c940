/**
 * @fileoverview Tests for current-status precedence and the merged timeline
 *
 * @module domain/__tests__/status-resolver
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { FDI_TOOTH_NUMBERS } from '@dentalcore/types';
import { mergeTimeline } from '../tooth-history/index.js';
import {
  TEST_NOW,
  createToothHistoryFixture,
  registerStatuses,
  type ToothHistoryFixture,
} from './tooth-history-fixtures.js';

const PATIENT = 'patient-1';
const DAY_1 = '2024-06-01';
const DAY_2 = '2024-06-02';

describe('StatusResolver', () => {
  let fixture: ToothHistoryFixture;

  beforeEach(async () => {
    fixture = createToothHistoryFixture();
    await fixture.catalog.seedPredefined();
    await registerStatuses(fixture.catalog, ['pain', 'sensitivity', 'caries']);
  });

  describe('currentStatus', () => {
    it('should default to normal when the tooth has no history', async () => {
      const current = await fixture.resolver.currentStatus(PATIENT, 21);

      expect(current).toEqual({
        toothNumber: 21,
        status: 'normal',
        source: 'default',
        display: {
          id: 'normal',
          displayName: 'Normal',
          code: 'NORM',
          category: 'healthy',
          color: '#00FF00',
          active: true,
          resolved: true,
        },
        patientStream: null,
        doctorStream: null,
      });
    });

    it('should fall back to the latest patient report', async () => {
      await fixture.ledger.append({
        patientId: PATIENT,
        toothNumber: 21,
        source: 'patient_reported',
        status: 'pain',
        date: DAY_1,
      });
      await fixture.ledger.append({
        patientId: PATIENT,
        toothNumber: 21,
        source: 'patient_reported',
        status: 'sensitivity',
        date: DAY_2,
      });

      const current = await fixture.resolver.currentStatus(PATIENT, 21);

      expect(current.status).toBe('sensitivity');
      expect(current.source).toBe('patient_reported');
      expect(current.patientStream?.entryCount).toBe(2);
      expect(current.doctorStream).toBeNull();
    });

    it('should let the doctor outrank a later patient report', async () => {
      await fixture.ledger.append({
        patientId: PATIENT,
        toothNumber: 21,
        source: 'doctor_diagnosed',
        status: 'caries',
        date: DAY_1,
      });
      await fixture.ledger.append({
        patientId: PATIENT,
        toothNumber: 21,
        source: 'patient_reported',
        status: 'pain',
        date: DAY_2,
      });

      const current = await fixture.resolver.currentStatus(PATIENT, 21);

      expect(current.status).toBe('caries');
      expect(current.source).toBe('doctor_diagnosed');
      expect(current.patientStream).toMatchObject({ currentStatus: 'pain', currentDate: DAY_2 });
      expect(current.doctorStream).toMatchObject({ currentStatus: 'caries', currentDate: DAY_1 });
    });

    it('should resolve legacy ids missing from the catalog for display', async () => {
      await fixture.historyRepository.appendEntry(
        { patientId: PATIENT, toothNumber: 16, source: 'doctor_diagnosed' },
        { status: 'old free text', description: '', date: DAY_1 },
        'ths_legacy',
        new Date(TEST_NOW)
      );

      const current = await fixture.resolver.currentStatus(PATIENT, 16);

      expect(current.status).toBe('old free text');
      expect(current.display).toMatchObject({
        displayName: 'old free text',
        color: '#808080',
        resolved: false,
      });
    });
  });

  describe('mouthSummary', () => {
    it('should always cover all 32 teeth in FDI order', async () => {
      const summary = await fixture.resolver.mouthSummary(PATIENT);

      expect(summary.map((tooth) => tooth.toothNumber)).toEqual([...FDI_TOOTH_NUMBERS]);
      expect(summary.every((tooth) => tooth.status === 'normal')).toBe(true);
    });

    it('should apply precedence per tooth', async () => {
      await fixture.ledger.append({
        patientId: PATIENT,
        toothNumber: 21,
        source: 'patient_reported',
        status: 'pain',
      });
      await fixture.ledger.append({
        patientId: PATIENT,
        toothNumber: 21,
        source: 'doctor_diagnosed',
        status: 'caries',
      });
      await fixture.ledger.append({
        patientId: PATIENT,
        toothNumber: 46,
        source: 'patient_reported',
        status: 'sensitivity',
      });

      const summary = await fixture.resolver.mouthSummary(PATIENT);
      const byTooth = new Map(summary.map((tooth) => [tooth.toothNumber, tooth]));

      expect(summary).toHaveLength(32);
      expect(byTooth.get(21)).toMatchObject({ status: 'caries', source: 'doctor_diagnosed' });
      expect(byTooth.get(46)).toMatchObject({ status: 'sensitivity', source: 'patient_reported' });
      expect(byTooth.get(11)).toMatchObject({ status: 'normal', source: 'default' });
    });
  });
});

describe('TimelineMerger', () => {
  let fixture: ToothHistoryFixture;

  beforeEach(async () => {
    fixture = createToothHistoryFixture();
    await registerStatuses(fixture.catalog, ['pain', 'sensitivity', 'caries']);
  });

  it('should merge both streams newest first, patient before doctor on equal dates', async () => {
    await fixture.ledger.append({
      patientId: PATIENT,
      toothNumber: 21,
      source: 'patient_reported',
      status: 'pain',
      description: 'sharp pain',
      date: DAY_1,
    });
    await fixture.ledger.append({
      patientId: PATIENT,
      toothNumber: 21,
      source: 'patient_reported',
      status: 'sensitivity',
      description: 'cold',
      date: DAY_2,
    });
    const doctorStream = await fixture.ledger.append({
      patientId: PATIENT,
      toothNumber: 21,
      source: 'doctor_diagnosed',
      status: 'caries',
      description: 'small cavity',
      date: DAY_2,
    });

    const [patientStream] = await fixture.ledger.read(PATIENT, 21, 'patient_reported');
    const entries = await fixture.timeline.timeline(PATIENT, 21);

    expect(entries).toEqual([
      {
        date: DAY_2,
        source: 'patient_reported',
        status: 'sensitivity',
        description: 'cold',
        streamId: patientStream?.streamId,
        index: 1,
      },
      {
        date: DAY_2,
        source: 'doctor_diagnosed',
        status: 'caries',
        description: 'small cavity',
        streamId: doctorStream,
        index: 0,
      },
      {
        date: DAY_1,
        source: 'patient_reported',
        status: 'pain',
        description: 'sharp pain',
        streamId: patientStream?.streamId,
        index: 0,
      },
    ]);

    const current = await fixture.resolver.currentStatus(PATIENT, 21);
    expect(current.status).toBe('caries');
  });

  it('should keep recorded order for same-day entries of one stream', () => {
    const entries = mergeTimeline({
      patient_reported: null,
      doctor_diagnosed: {
        streamId: 'ths_1',
        patientId: PATIENT,
        toothNumber: 11,
        source: 'doctor_diagnosed',
        statuses: ['a', 'b', 'c'],
        descriptions: ['', '', ''],
        dates: [DAY_1, DAY_1, DAY_2],
        entryCount: 3,
        currentStatus: 'c',
        currentDescription: '',
        currentDate: DAY_2,
        createdAt: new Date(TEST_NOW),
        updatedAt: new Date(TEST_NOW),
      },
    });

    expect(entries.map((entry) => entry.status)).toEqual(['c', 'a', 'b']);
  });

  it('should be empty for a tooth without history', async () => {
    await expect(fixture.timeline.timeline(PATIENT, 21)).resolves.toEqual([]);
  });
});
