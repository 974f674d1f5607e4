import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DeepPartial, EntityManager, Repository } from 'typeorm';
import { Activity } from '../entities/activity.entity';

@Injectable()
export class ActivityRepository {
  constructor(@InjectRepository(Activity) private readonly repo: Repository<Activity>) {}

  async create(data: DeepPartial<Activity>, manager?: EntityManager): Promise<Activity> {
    const repo = manager ? manager.getRepository(Activity) : this.repo;
    return repo.save(repo.create(data));
  }

  findByContact(contactId: string): Promise<Activity[]> {
    return this.repo.find({ where: { contactId }, order: { createdAt: 'DESC' } });
  }
}
