export interface SubjectMatch {
  id: string;
  name: string;
}

export type SubjectLookup =
  | { status: 'found'; subject: SubjectMatch }
  | { status: 'missing' }
  | { status: 'ambiguous'; count: number };

export interface UserCriteria {
  idNumber?: string;
  username?: string;
}

export interface GroupCriteria {
  idNumber?: string;
  name?: string;
}

/** Read-only view of the users and course groups an override can target. */
export interface SubjectDirectory {
  findUser(id: string): Promise<SubjectMatch | null>;
  findCourseGroup(id: string, courseId: string): Promise<SubjectMatch | null>;
  lookupUser(criteria: UserCriteria): Promise<SubjectLookup>;
  lookupCourseGroup(courseId: string, criteria: GroupCriteria): Promise<SubjectLookup>;
}
