import { sql } from 'drizzle-orm';
import {
  boolean,
  check,
  doublePrecision,
  index,
  integer,
  jsonb,
  pgEnum,
  pgTable,
  text,
  timestamp,
  uuid,
  varchar,
} from 'drizzle-orm/pg-core';
import {
  PROGRAM_CATEGORIES,
  PROGRESS_STATUSES,
  RECOMMENDATION_STATUSES,
} from '../types/rehab.js';
import type { AssignmentGap, FeatureValue, NoteSentiment, ProfileFeatures } from '../types/rehab.js';

export const programCategoryEnum = pgEnum('program_category', PROGRAM_CATEGORIES);
export const recommendationStatusEnum = pgEnum('recommendation_status', RECOMMENDATION_STATUSES);
export const progressStatusEnum = pgEnum('progress_status', PROGRESS_STATUSES);

export const rehabProfiles = pgTable('rehab_profiles', {
  inmateId: varchar('inmate_id', { length: 64 }).primaryKey(),
  suitabilityGroup: varchar('suitability_group', { length: 100 }).notNull().default('general'),
  riskScore: doublePrecision('risk_score').notNull().default(0.5),
  features: jsonb('features').$type<ProfileFeatures>().notNull().default({}),
  lastUpdated: timestamp('last_updated', { withTimezone: true }).notNull().defaultNow(),
});

export const programs = pgTable(
  'programs',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    name: varchar('name', { length: 255 }).notNull(),
    category: programCategoryEnum('category').notNull(),
    durationWeeks: integer('duration_weeks').notNull(),
    requiredSkills: text('required_skills').array().notNull().default(sql`'{}'::text[]`),
    capacity: integer('capacity').notNull(),
    currentEnrollment: integer('current_enrollment').notNull().default(0),
    description: text('description'),
    active: boolean('active').notNull().default(true),
  },
  (table) => ({
    categoryIdx: index('programs_category_idx').on(table.category, table.active),
  })
);

/**
 * Load counters are only ever changed by conditional single-row updates,
 * and the checks below make an overshoot impossible even for ad-hoc writes.
 */
export const rehabStations = pgTable(
  'rehab_stations',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    name: varchar('name', { length: 255 }).notNull(),
    location: varchar('location', { length: 255 }),
    zone: varchar('zone', { length: 100 }),
    capacity: integer('capacity').notNull(),
    currentLoad: integer('current_load').notNull().default(0),
    specializations: text('specializations').array().notNull().default(sql`'{}'::text[]`),
    successRate: doublePrecision('success_rate'),
    active: boolean('active').notNull().default(true),
  },
  (table) => ({
    loadWithinCapacity: check(
      'rehab_stations_load_check',
      sql`${table.currentLoad} >= 0 AND ${table.currentLoad} <= ${table.capacity}`
    ),
  })
);

export const officers = pgTable(
  'officers',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    badgeNumber: varchar('badge_number', { length: 64 }).notNull().unique(),
    name: varchar('name', { length: 255 }).notNull(),
    specializations: text('specializations').array().notNull().default(sql`'{}'::text[]`),
    assignedStationId: uuid('assigned_station_id').references(() => rehabStations.id),
    currentLoad: integer('current_load').notNull().default(0),
    maxCapacity: integer('max_capacity').notNull().default(10),
    successRate: doublePrecision('success_rate'),
    active: boolean('active').notNull().default(true),
  },
  (table) => ({
    loadWithinCapacity: check(
      'officers_load_check',
      sql`${table.currentLoad} >= 0 AND ${table.currentLoad} <= ${table.maxCapacity}`
    ),
  })
);

export const recommendations = pgTable(
  'recommendations',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    inmateId: varchar('inmate_id', { length: 64 }).notNull(),
    programId: uuid('program_id')
      .notNull()
      .references(() => programs.id),
    stationId: uuid('station_id').references(() => rehabStations.id),
    officerId: uuid('officer_id').references(() => officers.id),
    recommendedDurationWeeks: integer('recommended_duration_weeks').notNull(),
    rationale: text('rationale').notNull(),
    confidence: doublePrecision('confidence').notNull(),
    degraded: boolean('degraded').notNull().default(false),
    assignmentGaps: jsonb('assignment_gaps').$type<AssignmentGap[]>().notNull().default([]),
    status: recommendationStatusEnum('status').notNull().default('PENDING'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    startDate: timestamp('start_date', { withTimezone: true }),
    expectedEndDate: timestamp('expected_end_date', { withTimezone: true }),
  },
  (table) => ({
    inmateIdx: index('recommendations_inmate_idx').on(table.inmateId, table.createdAt),
  })
);

export const progressLogs = pgTable(
  'progress_logs',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    inmateId: varchar('inmate_id', { length: 64 }).notNull(),
    recommendationId: uuid('recommendation_id')
      .notNull()
      .references(() => recommendations.id),
    loggedAt: timestamp('logged_at', { withTimezone: true }).notNull().defaultNow(),
    status: progressStatusEnum('status').notNull(),
    progressPercentage: integer('progress_percentage'),
    notes: text('notes'),
    recordedBy: varchar('recorded_by', { length: 64 }).notNull(),
  },
  (table) => ({
    recommendationIdx: index('progress_logs_recommendation_idx').on(
      table.recommendationId,
      table.loggedAt
    ),
  })
);

export const medicalReports = pgTable('medical_reports', {
  id: uuid('id').primaryKey().defaultRandom(),
  inmateId: varchar('inmate_id', { length: 64 }).notNull(),
  officerId: varchar('officer_id', { length: 64 }).notNull(),
  reportedAt: timestamp('reported_at', { withTimezone: true }).notNull().defaultNow(),
  vitals: jsonb('vitals').$type<Record<string, FeatureValue>>().notNull().default({}),
  diagnosis: text('diagnosis'),
  notes: text('notes'),
});

export const counselingNotes = pgTable('counseling_notes', {
  id: uuid('id').primaryKey().defaultRandom(),
  inmateId: varchar('inmate_id', { length: 64 }).notNull(),
  counselorId: varchar('counselor_id', { length: 64 }).notNull(),
  sessionDate: timestamp('session_date', { withTimezone: true }).notNull().defaultNow(),
  text: text('text').notNull(),
  sessionScore: doublePrecision('session_score'),
  sentiment: varchar('sentiment', { length: 16 }).$type<NoteSentiment>(),
  summary: text('summary').notNull(),
  keyPoints: text('key_points').array().notNull().default(sql`'{}'::text[]`),
});

export const schema = {
  programCategoryEnum,
  recommendationStatusEnum,
  progressStatusEnum,
  rehabProfiles,
  programs,
  rehabStations,
  officers,
  recommendations,
  progressLogs,
  medicalReports,
  counselingNotes,
};
