import { z } from 'zod';
import { DEFAULT_EVENT_VERSION } from '../domain/index.js';

/**
 * Zod schemas for the event catalog.
 *
 * The catalog is closed: every event is one variant of `domainEventSchema`,
 * discriminated by `event_type`. The type string is only a routing tag
 * (it becomes the publish subject); consumers narrow on it like any other
 * discriminated union.
 *
 * Timestamps and dates stay ISO-8601 strings so an event encodes and decodes
 * without conversion.
 */

const isoDateTime = z.string().datetime({ offset: true });
const isoDate = z.string().date();
const id = z.string().min(1);
const changes = z.record(z.string(), z.unknown());
const now = (): string => new Date().toISOString();

export const eventMetadataSchema = z.object({
  source_service: z.string().min(1),
  correlation_id: z.string().optional(),
  causation_id: z.string().optional(),
  user_id: z.string().optional(),
  institution_id: z.string().optional(),
  trace_context: z.record(z.string(), z.unknown()).default({}),
});

export const baseEventSchema = z.object({
  event_id: z.string().uuid(),
  event_version: z.string().min(1).default(DEFAULT_EVENT_VERSION),
  timestamp: isoDateTime,
  metadata: eventMetadataSchema,
});

// ── Profile ──────────────────────────────────────────────

export const profileCreatedSchema = baseEventSchema.extend({
  event_type: z.literal('academic.profile.created'),
  student_id: id,
  email: z.string(),
  first_name: z.string(),
  last_name: z.string(),
  institution_id: id,
  major: z.string().optional(),
  minor: z.string().optional(),
  year: z.number().int().optional(),
  enrollment_status: z.string().default('Active'),
  student_type: z.string().default('Undergraduate'),
  matriculation_date: isoDateTime,
  expected_graduation: isoDateTime.optional(),
  cumulative_gpa: z.number().optional(),
  phone: z.string().optional(),
  emergency_contact: z.string().optional(),
  academic_advisor: z.string().optional(),
  profile_picture_url: z.string().optional(),
});

export const profileUpdatedSchema = baseEventSchema.extend({
  event_type: z.literal('academic.profile.updated'),
  student_id: id,
  changes,
  previous_values: changes.optional(),
});

export const profileEnrolledSchema = baseEventSchema.extend({
  event_type: z.literal('academic.profile.enrolled'),
  student_id: id,
  course_id: id,
  enrollment_date: isoDateTime,
  grading_basis: z.string().default('Letter'),
  enrollment_status: z.string().default('Active'),
  final_grade: z.number().optional(),
  letter_grade: z.string().optional(),
});

export const profileUnenrolledSchema = baseEventSchema.extend({
  event_type: z.literal('academic.profile.unenrolled'),
  student_id: id,
  course_id: id,
  unenroll_date: isoDateTime,
  reason: z.string().optional(),
  final_grade: z.number().optional(),
  letter_grade: z.string().optional(),
});

// ── Course ───────────────────────────────────────────────

export const courseCreatedSchema = baseEventSchema.extend({
  event_type: z.literal('academic.course.created'),
  course_id: id,
  title: z.string(),
  code: z.string(),
  number: z.string(),
  term: z.string(),
  credits: z.number().int(),
  description: z.string(),
  instructor_name: z.string(),
  instructor_email: z.string(),
  institution_id: id,
  component_type: z.array(z.string()).default([]),
  prerequisites: z.array(z.string()).default([]),
  grading_options: z.array(z.string()).default(['Letter']),
  syllabus_url: z.string().optional(),
  learning_objectives: z.array(z.string()).default([]),
  final_exam_date: isoDateTime.optional(),
});

export const courseUpdatedSchema = baseEventSchema.extend({
  event_type: z.literal('academic.course.updated'),
  course_id: id,
  changes,
  previous_values: changes.optional(),
});

export const courseDeletedSchema = baseEventSchema.extend({
  event_type: z.literal('academic.course.deleted'),
  course_id: id,
  soft_delete: z.boolean().default(true),
  deletion_reason: z.string().optional(),
});

// ── Assignment ───────────────────────────────────────────

export const assignmentCreatedSchema = baseEventSchema.extend({
  event_type: z.literal('academic.assignment.created'),
  assignment_id: id,
  title: z.string(),
  course_id: id,
  student_id: z.string().optional(),
  type: z.string(),
  description: z.string(),
  due_date: isoDateTime,
  points_possible: z.number().int(),
  points_earned: z.number().optional(),
  percentage_grade: z.number().optional(),
  weight: z.number(),
  submission_status: z.string().default('Not Started'),
  submission_url: z.string().optional(),
  instructions_url: z.string().optional(),
  estimated_hours: z.number().int().optional(),
  late_penalty: z.string().optional(),
  rubric: z.array(z.record(z.string(), z.unknown())).optional(),
});

export const assignmentUpdatedSchema = baseEventSchema.extend({
  event_type: z.literal('academic.assignment.updated'),
  assignment_id: id,
  changes,
  previous_values: changes.optional(),
});

export const assignmentDeletedSchema = baseEventSchema.extend({
  event_type: z.literal('academic.assignment.deleted'),
  assignment_id: id,
  soft_delete: z.boolean().default(true),
  deletion_reason: z.string().optional(),
});

// ── Exam ─────────────────────────────────────────────────

export const examCreatedSchema = baseEventSchema.extend({
  event_type: z.literal('academic.exam.created'),
  exam_id: id,
  title: z.string(),
  course_id: id,
  student_id: z.string().optional(),
  exam_type: z.string(),
  date: isoDateTime,
  duration_minutes: z.number().int(),
  location: z.string(),
  points_possible: z.number().int(),
  points_earned: z.number().optional(),
  percentage_grade: z.number().optional(),
  weight: z.number(),
  topics_covered: z.array(z.string()).default([]),
  format: z.string(),
  open_book: z.boolean().default(false),
  allowed_materials: z.array(z.string()).default([]),
  preparation_notes: z.string().optional(),
});

export const examUpdatedSchema = baseEventSchema.extend({
  event_type: z.literal('academic.exam.updated'),
  exam_id: id,
  changes,
  previous_values: changes.optional(),
});

export const examDeletedSchema = baseEventSchema.extend({
  event_type: z.literal('academic.exam.deleted'),
  exam_id: id,
  soft_delete: z.boolean().default(true),
  deletion_reason: z.string().optional(),
});

// ── Quiz ─────────────────────────────────────────────────

export const quizCreatedSchema = baseEventSchema.extend({
  event_type: z.literal('academic.quiz.created'),
  quiz_id: id,
  title: z.string(),
  course_id: id,
  student_id: z.string().optional(),
  quiz_number: z.number().int(),
  date: isoDateTime,
  duration_minutes: z.number().int(),
  points_possible: z.number().int(),
  points_earned: z.number().optional(),
  percentage_grade: z.number().optional(),
  weight: z.number(),
  topics_covered: z.array(z.string()).default([]),
  format: z.string().default('Online'),
  attempts_allowed: z.number().int().default(1),
  auto_graded: z.boolean().default(true),
});

export const quizUpdatedSchema = baseEventSchema.extend({
  event_type: z.literal('academic.quiz.updated'),
  quiz_id: id,
  changes,
  previous_values: changes.optional(),
});

export const quizDeletedSchema = baseEventSchema.extend({
  event_type: z.literal('academic.quiz.deleted'),
  quiz_id: id,
  soft_delete: z.boolean().default(true),
  deletion_reason: z.string().optional(),
});

// ── Lab session ──────────────────────────────────────────

export const labSessionCreatedSchema = baseEventSchema.extend({
  event_type: z.literal('academic.lab.created'),
  lab_id: id,
  title: z.string(),
  course_id: id,
  student_id: z.string().optional(),
  session_number: z.number().int(),
  date: isoDateTime,
  duration_minutes: z.number().int(),
  location: z.string(),
  instructor_name: z.string(),
  experiment_title: z.string(),
  objectives: z.array(z.string()).default([]),
  pre_lab_reading: z.string().optional(),
  pre_lab_assignment_due: isoDateTime.optional(),
  equipment_needed: z.array(z.string()).default([]),
  safety_requirements: z.array(z.string()).default([]),
  submission_deadline: isoDateTime.optional(),
  points_possible: z.number().int().optional(),
  points_earned: z.number().optional(),
});

export const labSessionUpdatedSchema = baseEventSchema.extend({
  event_type: z.literal('academic.lab.updated'),
  lab_id: id,
  changes,
  previous_values: changes.optional(),
});

export const labSessionDeletedSchema = baseEventSchema.extend({
  event_type: z.literal('academic.lab.deleted'),
  lab_id: id,
  soft_delete: z.boolean().default(true),
  deletion_reason: z.string().optional(),
});

// ── Study todo ───────────────────────────────────────────

export const studyTodoCreatedSchema = baseEventSchema.extend({
  event_type: z.literal('academic.study.created'),
  todo_id: id,
  title: z.string(),
  student_id: id,
  course_id: z.string().optional(),
  description: z.string(),
  priority: z.string(),
  status: z.string().default('Next Action'),
  due_date: isoDateTime.optional(),
  estimated_minutes: z.number().int(),
  actual_minutes: z.number().int().optional(),
  context: z.array(z.string()).default([]),
  energy_required: z.string().default('Medium'),
  created_date: isoDateTime.default(now),
  completed_date: isoDateTime.optional(),
  recurrence: z.string().default('None'),
  ai_generated: z.boolean().default(false),
  source: z.string().default('User'),
});

export const studyTodoUpdatedSchema = baseEventSchema.extend({
  event_type: z.literal('academic.study.updated'),
  todo_id: id,
  changes,
  previous_values: changes.optional(),
});

export const studyTodoDeletedSchema = baseEventSchema.extend({
  event_type: z.literal('academic.study.deleted'),
  todo_id: id,
  soft_delete: z.boolean().default(true),
  deletion_reason: z.string().optional(),
});

// ── Challenge area ───────────────────────────────────────

export const challengeAreaCreatedSchema = baseEventSchema.extend({
  event_type: z.literal('academic.challenge.created'),
  challenge_id: id,
  title: z.string(),
  student_id: id,
  course_id: z.string().optional(),
  description: z.string(),
  severity: z.string(),
  identified_date: isoDateTime.default(now),
  detection_method: z.string(),
  status: z.string().default('Active'),
  resolution_date: isoDateTime.optional(),
  performance_trend: z.array(z.number()).default([]),
  confidence_level: z.number().int(),
  related_topics: z.array(z.string()).default([]),
  improvement_notes: z.string().optional(),
});

export const challengeAreaUpdatedSchema = baseEventSchema.extend({
  event_type: z.literal('academic.challenge.updated'),
  challenge_id: id,
  changes,
  previous_values: changes.optional(),
});

export const challengeAreaDeletedSchema = baseEventSchema.extend({
  event_type: z.literal('academic.challenge.deleted'),
  challenge_id: id,
  soft_delete: z.boolean().default(true),
  deletion_reason: z.string().optional(),
});

// ── Class schedule ───────────────────────────────────────

export const classScheduleCreatedSchema = baseEventSchema.extend({
  event_type: z.literal('academic.schedule.created'),
  schedule_id: id,
  course_id: id,
  institution_id: id,
  days_of_week: z.array(z.string()),
  start_time: z.string(),
  end_time: z.string(),
  building: z.string(),
  room: z.string(),
  campus: z.string().default('Main Campus'),
  format: z.string(),
  meeting_url: z.string().optional(),
  instructor_office_hours: z.array(z.string()).default([]),
  section_number: z.string(),
  enrollment_capacity: z.number().int(),
  term_start_date: isoDate,
  term_end_date: isoDate,
});

export const classScheduleUpdatedSchema = baseEventSchema.extend({
  event_type: z.literal('academic.schedule.updated'),
  schedule_id: id,
  changes,
  previous_values: changes.optional(),
});

export const classScheduleDeletedSchema = baseEventSchema.extend({
  event_type: z.literal('academic.schedule.deleted'),
  schedule_id: id,
  soft_delete: z.boolean().default(true),
  deletion_reason: z.string().optional(),
});

/** Schema per event type; the key is the routing subject. */
export const EVENT_SCHEMAS = {
  'academic.profile.created': profileCreatedSchema,
  'academic.profile.updated': profileUpdatedSchema,
  'academic.profile.enrolled': profileEnrolledSchema,
  'academic.profile.unenrolled': profileUnenrolledSchema,
  'academic.course.created': courseCreatedSchema,
  'academic.course.updated': courseUpdatedSchema,
  'academic.course.deleted': courseDeletedSchema,
  'academic.assignment.created': assignmentCreatedSchema,
  'academic.assignment.updated': assignmentUpdatedSchema,
  'academic.assignment.deleted': assignmentDeletedSchema,
  'academic.exam.created': examCreatedSchema,
  'academic.exam.updated': examUpdatedSchema,
  'academic.exam.deleted': examDeletedSchema,
  'academic.quiz.created': quizCreatedSchema,
  'academic.quiz.updated': quizUpdatedSchema,
  'academic.quiz.deleted': quizDeletedSchema,
  'academic.lab.created': labSessionCreatedSchema,
  'academic.lab.updated': labSessionUpdatedSchema,
  'academic.lab.deleted': labSessionDeletedSchema,
  'academic.study.created': studyTodoCreatedSchema,
  'academic.study.updated': studyTodoUpdatedSchema,
  'academic.study.deleted': studyTodoDeletedSchema,
  'academic.challenge.created': challengeAreaCreatedSchema,
  'academic.challenge.updated': challengeAreaUpdatedSchema,
  'academic.challenge.deleted': challengeAreaDeletedSchema,
  'academic.schedule.created': classScheduleCreatedSchema,
  'academic.schedule.updated': classScheduleUpdatedSchema,
  'academic.schedule.deleted': classScheduleDeletedSchema,
} as const;

export const domainEventSchema = z.discriminatedUnion('event_type', [
  profileCreatedSchema,
  profileUpdatedSchema,
  profileEnrolledSchema,
  profileUnenrolledSchema,
  courseCreatedSchema,
  courseUpdatedSchema,
  courseDeletedSchema,
  assignmentCreatedSchema,
  assignmentUpdatedSchema,
  assignmentDeletedSchema,
  examCreatedSchema,
  examUpdatedSchema,
  examDeletedSchema,
  quizCreatedSchema,
  quizUpdatedSchema,
  quizDeletedSchema,
  labSessionCreatedSchema,
  labSessionUpdatedSchema,
  labSessionDeletedSchema,
  studyTodoCreatedSchema,
  studyTodoUpdatedSchema,
  studyTodoDeletedSchema,
  challengeAreaCreatedSchema,
  challengeAreaUpdatedSchema,
  challengeAreaDeletedSchema,
  classScheduleCreatedSchema,
  classScheduleUpdatedSchema,
  classScheduleDeletedSchema,
]);

export type EventType = keyof typeof EVENT_SCHEMAS;

export function isEventType(value: string): value is EventType {
  return Object.hasOwn(EVENT_SCHEMAS, value);
}

export const EVENT_TYPES: readonly EventType[] = Object.keys(EVENT_SCHEMAS).filter(isEventType);

/** Any validated catalog event. */
export type DomainEvent = z.infer<typeof domainEventSchema>;

/** The catalog variant for one event type. */
export type EventOf<T extends EventType> = Extract<DomainEvent, { event_type: T }>;

/** Variant-specific fields accepted by `createEvent` (defaults may be omitted). */
export type EventFields<T extends EventType> = Omit<
  z.input<(typeof EVENT_SCHEMAS)[T]>,
  'event_type' | 'event_id' | 'event_version' | 'timestamp' | 'metadata'
>;

export type EventMetadataInput = z.input<typeof eventMetadataSchema>;
