import { Injectable, Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { readFile } from 'fs/promises';
import * as path from 'path';
import { GameshowConfigService } from '../../config/gameshow-config.service';
import { GameshowError, describeError } from '../../common/errors/gameshow.error';
import { Question } from '../../common/interfaces/question.interface';
import { QuestionRecordDto } from './dto/question-record.dto';

@Injectable()
export class QuestionLoaderService {
  private readonly logger = new Logger(QuestionLoaderService.name);

  constructor(private readonly config: GameshowConfigService) {}

  /**
   * Read and validate a JSON question file. Fails with LoadFailure when the
   * file is unreadable, not JSON, or any record is malformed.
   */
  async load(filePath: string): Promise<Question[]> {
    let raw: string;
    try {
      raw = await readFile(filePath, 'utf8');
    } catch (error) {
      throw new GameshowError(
        'LoadFailure',
        `Question file ${filePath} could not be read: ${describeError(error)}`,
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new GameshowError(
        'LoadFailure',
        `Question file ${filePath} is not valid JSON: ${describeError(error)}`,
      );
    }

    const questions = await this.parseRecords(parsed, filePath);
    this.logger.log(`Loaded ${questions.length} questions from ${filePath}`);
    return questions;
  }

  /**
   * Load a file by name from the configured questions directory.
   */
  async loadFromDirectory(filename: string): Promise<Question[]> {
    return this.load(this.resolveInDirectory(filename));
  }

  resolveInDirectory(filename: string): string {
    const directory = path.resolve(this.config.questionsDir);
    const resolved = path.resolve(directory, filename);
    const relative = path.relative(directory, resolved);

    if (
      relative === '' ||
      relative.startsWith('..') ||
      path.isAbsolute(relative)
    ) {
      throw new GameshowError(
        'LoadFailure',
        `Question file ${filename} is outside the questions directory`,
      );
    }
    return resolved;
  }

  private async parseRecords(
    parsed: unknown,
    filePath: string,
  ): Promise<Question[]> {
    if (!Array.isArray(parsed)) {
      throw new GameshowError(
        'LoadFailure',
        `Question file ${filePath} must contain a JSON array`,
      );
    }

    const records: unknown[] = parsed;
    const questions: Question[] = [];
    for (const [index, entry] of records.entries()) {
      if (typeof entry !== 'object' || entry === null) {
        throw new GameshowError(
          'LoadFailure',
          `Question ${index + 1} in ${filePath} is not an object`,
        );
      }

      const record = plainToInstance(QuestionRecordDto, entry);
      const errors = await validate(record);
      if (errors.length > 0) {
        const properties = errors.map((error) => error.property).join(', ');
        throw new GameshowError(
          'LoadFailure',
          `Question ${index + 1} in ${filePath} is invalid (${properties})`,
        );
      }

      questions.push({
        questionType: record.question_type,
        category: record.category,
        question: record.question,
        answers: Object.freeze([...record.answers]),
        correctAnswer: record.correct_answer,
      });
    }
    return questions;
  }
}
