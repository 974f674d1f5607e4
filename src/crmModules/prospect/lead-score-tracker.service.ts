// src/crmModules/prospect/lead-score-tracker.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, EntityManager } from 'typeorm';

import { ProspectRepository } from './repository/prospect.repository';
import { LeadScoreHistoryRepository } from './repository/lead-score-history.repository';
import { LEAD_SCORE_MAX, LEAD_SCORE_MIN } from './entities/prospect.entity';
import { ScoreChangeResult, ScoreContext, ScoreDelta } from './interface/prospect.interface';
import { notFound } from 'src/common/errors/crm-error';

export const clampScore = (score: number) => Math.min(LEAD_SCORE_MAX, Math.max(LEAD_SCORE_MIN, score));

/**
 * The only writer of `prospects.lead_score`. Every change lands together
 * with its history row.
 */
@Injectable()
export class LeadScoreTrackerService {
  private readonly logger = new Logger(LeadScoreTrackerService.name);

  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly prospects: ProspectRepository,
    private readonly history: LeadScoreHistoryRepository,
  ) {}

  /**
   * Adds `scoreChange` to the current score, clamped to 0..100. The history
   * row records the change actually applied.
   *
   * Joins the caller's transaction when `manager` is given, otherwise opens one.
   */
  async applyDelta(
    prospectId: string,
    delta: ScoreDelta,
    context: ScoreContext = {},
    manager?: EntityManager,
  ): Promise<ScoreChangeResult> {
    if (!manager) {
      return this.dataSource.transaction((m) => this.applyDelta(prospectId, delta, context, m));
    }

    const prospect = await this.prospects.findById(prospectId, manager, true);
    if (!prospect) throw notFound('Prospect', prospectId);

    const oldScore = prospect.leadScore;
    const newScore = clampScore(oldScore + delta.scoreChange);
    if (newScore !== oldScore) await this.prospects.setLeadScore(prospectId, newScore, manager);
    prospect.leadScore = newScore;

    const history = await this.history.append(
      {
        prospectId,
        oldScore,
        newScore,
        scoreChange: newScore - oldScore,
        reason: delta.reason,
        activityType: delta.activityType,
        campaignId: context.campaignId ?? null,
        campaignMemberId: context.campaignMemberId ?? null,
        changedBy: context.changedBy ?? null,
        notes: context.notes ?? null,
      },
      manager,
    );

    this.logger.debug(
      `[score] prospect ${prospectId} ${oldScore} -> ${newScore} (${delta.activityType}: ${delta.reason})`,
    );
    return { prospect, history };
  }

  /** Moves the score to `target` by applying the difference as a delta. */
  async setTo(
    prospectId: string,
    target: number,
    reason: string,
    context: ScoreContext,
    manager: EntityManager,
  ): Promise<ScoreChangeResult> {
    const prospect = await this.prospects.findById(prospectId, manager, true);
    if (!prospect) throw notFound('Prospect', prospectId);
    return this.applyDelta(
      prospectId,
      { scoreChange: clampScore(target) - prospect.leadScore, reason, activityType: 'manual_adjustment' },
      context,
      manager,
    );
  }
}
