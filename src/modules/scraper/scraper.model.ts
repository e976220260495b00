/**
 * Scraper MongoDB Model
 * Mongoose schema for persisted scrape results
 */

import mongoose, { Schema } from 'mongoose';
import { SCRAPE_ERROR_CODES } from '../../lib/scraping';
import { IScrapeResult, ScrapeStatus } from './scraper.types';

const AttemptSchema = new Schema({
  url: { type: String, required: true },
  backend: { type: String, enum: ['static', 'dynamic'], required: true },
  attempt: { type: Number, required: true },
  outcome: { type: String, required: true },
  elapsed_ms: { type: Number, required: true },
  status_code: Number,
}, { _id: false });

const WarningSchema = new Schema({
  code: { type: String, default: 'ExtractionWarning' },
  field: String,
  selector: String,
  message: String,
}, { _id: false });

const ResultMetadataSchema = new Schema({
  processing_time_seconds: { type: Number, default: 0 },
  html_size_bytes: { type: Number, default: 0 },
  data_items_count: { type: Number, default: 0 },
  final_url: { type: String, default: null },
  status_code: { type: Number, default: null },
  attempts: { type: [AttemptSchema], default: [] },
  warnings: { type: [WarningSchema], default: [] },
}, { _id: false });

const ScrapeResultSchema = new Schema<IScrapeResult>(
  {
    job_id: {
      type: String,
      required: true,
      unique: true,
    },
    source_url: {
      type: String,
      required: true,
    },
    scrape_timestamp: {
      type: String,
      required: true,
    },
    status: {
      type: String,
      enum: [ScrapeStatus.COMPLETED, ScrapeStatus.FAILED],
      required: true,
      index: true,
    },
    extraction_method: {
      type: String,
      enum: ['static', 'dynamic', null],
      default: null,
    },
    data: {
      type: Schema.Types.Mixed,
      default: [],
    },
    error_code: {
      type: String,
      enum: SCRAPE_ERROR_CODES,
    },
    error_message: String,
    metadata: {
      type: ResultMetadataSchema,
      required: true,
    },
  },
  {
    versionKey: false,
    minimize: false,
  }
);

ScrapeResultSchema.index({ scrape_timestamp: -1 });

export const ScrapeResultModel = mongoose.model<IScrapeResult>('ScrapeResult', ScrapeResultSchema);
