import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DeepPartial, In, Repository } from 'typeorm';
import { Deal } from '../entities/deal.entity';

@Injectable()
export class DealRepository {
  constructor(@InjectRepository(Deal) private readonly repo: Repository<Deal>) {}

  async create(data: DeepPartial<Deal>): Promise<Deal> {
    return this.repo.save(this.repo.create(data));
  }

  findById(id: string): Promise<Deal | null> {
    return this.repo.findOneBy({ id });
  }

  findByIds(ids: string[]): Promise<Deal[]> {
    if (!ids.length) return Promise.resolve([]);
    return this.repo.findBy({ id: In(ids) });
  }
}
