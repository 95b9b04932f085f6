import { ProgramCategory } from '../types/rehab.js';
import type { Officer, Program, Station } from '../types/rehab.js';

/**
 * Demo catalog and resource pool. Written to PostgreSQL by `npm run db:seed`
 * and loaded into the in-memory store at start-up.
 */

export const SEED_PROGRAMS: Program[] = [
  {
    id: '7d0f7a52-0a55-4d8e-9d47-1b1b0c6f1a01',
    name: 'Drug Rehabilitation Program',
    category: ProgramCategory.SUBSTANCE_ABUSE,
    durationWeeks: 12,
    requiredSkills: ['substance_abuse', 'counseling'],
    capacity: 40,
    currentEnrollment: 0,
    description: 'Structured detox support, group therapy and relapse prevention.',
    active: true,
  },
  {
    id: '7d0f7a52-0a55-4d8e-9d47-1b1b0c6f1a02',
    name: 'Mental Health Support Program',
    category: ProgramCategory.MENTAL_HEALTH,
    durationWeeks: 8,
    requiredSkills: ['mental_health', 'psychiatry'],
    capacity: 25,
    currentEnrollment: 0,
    description: 'Individual counseling with psychiatric review.',
    active: true,
  },
  {
    id: '7d0f7a52-0a55-4d8e-9d47-1b1b0c6f1a03',
    name: 'Vocational Training',
    category: ProgramCategory.VOCATIONAL,
    durationWeeks: 16,
    requiredSkills: ['vocational'],
    capacity: 60,
    currentEnrollment: 0,
    description: 'Workshop-based trade skills with certification.',
    active: true,
  },
  {
    id: '7d0f7a52-0a55-4d8e-9d47-1b1b0c6f1a04',
    name: 'GED Preparation Program',
    category: ProgramCategory.EDUCATION,
    durationWeeks: 20,
    requiredSkills: ['education'],
    capacity: 30,
    currentEnrollment: 0,
    description: null,
    active: true,
  },
  {
    id: '7d0f7a52-0a55-4d8e-9d47-1b1b0c6f1a05',
    name: 'Anger Management & Conflict Resolution',
    category: ProgramCategory.BEHAVIOR,
    durationWeeks: 10,
    requiredSkills: ['behavior', 'counseling'],
    capacity: 20,
    currentEnrollment: 0,
    description: null,
    active: true,
  },
];

export const SEED_STATIONS: Station[] = [
  {
    id: '3c9e1f4e-6b1d-4f3a-8a6e-2d5c7b8e0b01',
    name: 'North Wing Recovery Unit',
    location: 'Block A, Level 1',
    zone: 'north',
    capacity: 20,
    currentLoad: 0,
    specializations: ['substance_abuse', 'general'],
    successRate: 0.72,
    active: true,
  },
  {
    id: '3c9e1f4e-6b1d-4f3a-8a6e-2d5c7b8e0b02',
    name: 'South Wellness Centre',
    location: 'Block C, Level 2',
    zone: 'south',
    capacity: 15,
    currentLoad: 0,
    specializations: ['mental_health', 'general'],
    successRate: 0.68,
    active: true,
  },
  {
    id: '3c9e1f4e-6b1d-4f3a-8a6e-2d5c7b8e0b03',
    name: 'East Workshop',
    location: 'Industrial Annex',
    zone: 'east',
    capacity: 30,
    currentLoad: 0,
    specializations: ['vocational', 'education'],
    successRate: 0.61,
    active: true,
  },
  {
    id: '3c9e1f4e-6b1d-4f3a-8a6e-2d5c7b8e0b04',
    name: 'West Learning Centre',
    location: 'Block D, Level 1',
    zone: 'west',
    capacity: 12,
    currentLoad: 0,
    specializations: ['education', 'behavior'],
    successRate: null,
    active: true,
  },
];

export const SEED_OFFICERS: Officer[] = [
  {
    id: 'b5a2c8d1-2e4f-4a6b-9c8d-0e1f2a3b4c01',
    badgeNumber: 'MO-1001',
    name: 'Officer A. Perera',
    specializations: ['substance_abuse', 'counseling'],
    assignedStationId: '3c9e1f4e-6b1d-4f3a-8a6e-2d5c7b8e0b01',
    currentLoad: 0,
    maxCapacity: 10,
    successRate: 0.75,
    active: true,
  },
  {
    id: 'b5a2c8d1-2e4f-4a6b-9c8d-0e1f2a3b4c02',
    badgeNumber: 'MO-1002',
    name: 'Officer N. Silva',
    specializations: ['general'],
    assignedStationId: '3c9e1f4e-6b1d-4f3a-8a6e-2d5c7b8e0b01',
    currentLoad: 0,
    maxCapacity: 8,
    successRate: 0.6,
    active: true,
  },
  {
    id: 'b5a2c8d1-2e4f-4a6b-9c8d-0e1f2a3b4c03',
    badgeNumber: 'MO-1003',
    name: 'Officer K. Fernando',
    specializations: ['mental_health', 'psychiatry'],
    assignedStationId: '3c9e1f4e-6b1d-4f3a-8a6e-2d5c7b8e0b02',
    currentLoad: 0,
    maxCapacity: 10,
    successRate: 0.7,
    active: true,
  },
  {
    id: 'b5a2c8d1-2e4f-4a6b-9c8d-0e1f2a3b4c04',
    badgeNumber: 'MO-1004',
    name: 'Officer R. Jayasinghe',
    specializations: ['vocational'],
    assignedStationId: '3c9e1f4e-6b1d-4f3a-8a6e-2d5c7b8e0b03',
    currentLoad: 0,
    maxCapacity: 15,
    successRate: 0.58,
    active: true,
  },
  {
    id: 'b5a2c8d1-2e4f-4a6b-9c8d-0e1f2a3b4c05',
    badgeNumber: 'MO-1005',
    name: 'Officer D. Wickramasinghe',
    specializations: ['education', 'behavior'],
    assignedStationId: '3c9e1f4e-6b1d-4f3a-8a6e-2d5c7b8e0b04',
    currentLoad: 0,
    maxCapacity: 10,
    successRate: null,
    active: true,
  },
  {
    id: 'b5a2c8d1-2e4f-4a6b-9c8d-0e1f2a3b4c06',
    badgeNumber: 'MO-1006',
    name: 'Officer S. Bandara',
    specializations: ['general', 'counseling'],
    assignedStationId: null,
    currentLoad: 0,
    maxCapacity: 12,
    successRate: 0.65,
    active: true,
  },
];
