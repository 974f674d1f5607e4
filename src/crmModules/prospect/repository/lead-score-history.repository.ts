import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DeepPartial, EntityManager, Repository } from 'typeorm';
import { LeadScoreHistory } from '../entities/lead-score-history.entity';

/** Append-only: rows are inserted and read, never updated. */
@Injectable()
export class LeadScoreHistoryRepository {
  constructor(@InjectRepository(LeadScoreHistory) private readonly repo: Repository<LeadScoreHistory>) {}

  async append(row: DeepPartial<LeadScoreHistory>, manager?: EntityManager): Promise<LeadScoreHistory> {
    const repo = manager ? manager.getRepository(LeadScoreHistory) : this.repo;
    return repo.save(repo.create(row));
  }

  /** Oldest first. */
  findByProspect(prospectId: string): Promise<LeadScoreHistory[]> {
    return this.repo
      .createQueryBuilder('h')
      .where('h.prospectId = :prospectId', { prospectId })
      .orderBy('h.createdAt', 'ASC')
      .addOrderBy('h.id', 'ASC')
      .getMany();
  }

  async removeForProspect(prospectId: string, manager?: EntityManager): Promise<void> {
    const repo = manager ? manager.getRepository(LeadScoreHistory) : this.repo;
    await repo.delete({ prospectId });
  }
}
