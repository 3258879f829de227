export interface JobRecord {
  id: string;
  title: string;
  requirements: string[];
  responsibilities: string[];
  skillsRequired: string[];
  experienceRequired: number;
  createdAt: string;
  updatedAt: string;
}

export interface JobWriteModel {
  title: string;
  requirements: string[];
  responsibilities: string[];
  skillsRequired: string[];
  experienceRequired: number;
}

export type JobUpdateModel = Partial<JobWriteModel>;

export interface JobFilter {
  title?: string;
}
