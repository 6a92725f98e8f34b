import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, Repository } from 'typeorm';
import { isUUID } from 'class-validator';
import { User } from '../../user/entities/user.entity';
import { CourseGroup } from '../../course/entities/course-group.entity';
import { GroupCriteria, SubjectDirectory, SubjectLookup, SubjectMatch, UserCriteria } from './subject-directory';

const displayName = (user: User): string =>
  `${user.firstName ?? ''} ${user.lastName ?? ''}`.trim() || user.username;

@Injectable()
export class TypeOrmSubjectDirectory implements SubjectDirectory {
  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,

    @InjectRepository(CourseGroup)
    private readonly groupRepository: Repository<CourseGroup>,
  ) {}

  async findUser(id: string): Promise<SubjectMatch | null> {
    // Ids are uuids; anything else cannot match and would fail the cast in postgres
    if (!isUUID(id)) return null;
    const user = await this.userRepository.findOne({ where: { id } });
    return user ? { id: user.id, name: displayName(user) } : null;
  }

  async findCourseGroup(id: string, courseId: string): Promise<SubjectMatch | null> {
    if (!isUUID(id)) return null;
    const group = await this.groupRepository.findOne({ where: { id, courseId } });
    return group ? { id: group.id, name: group.name } : null;
  }

  async lookupUser(criteria: UserCriteria): Promise<SubjectLookup> {
    let where: FindOptionsWhere<User>;
    if (criteria.idNumber) {
      where = { idNumber: criteria.idNumber };
    } else if (criteria.username) {
      where = { username: criteria.username };
    } else {
      return { status: 'missing' };
    }

    const users = await this.userRepository.find({ where, take: 2 });
    return this.toLookup(users.map((user) => ({ id: user.id, name: displayName(user) })));
  }

  async lookupCourseGroup(courseId: string, criteria: GroupCriteria): Promise<SubjectLookup> {
    let where: FindOptionsWhere<CourseGroup>;
    if (criteria.idNumber) {
      where = { courseId, idNumber: criteria.idNumber };
    } else if (criteria.name) {
      where = { courseId, name: criteria.name };
    } else {
      return { status: 'missing' };
    }

    const groups = await this.groupRepository.find({ where, take: 2 });
    return this.toLookup(groups.map((group) => ({ id: group.id, name: group.name })));
  }

  private toLookup(matches: SubjectMatch[]): SubjectLookup {
    if (matches.length === 0) return { status: 'missing' };
    if (matches.length > 1) return { status: 'ambiguous', count: matches.length };
    return { status: 'found', subject: matches[0] };
  }
}
