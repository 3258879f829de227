export interface ContactInfo {
  email: string;
  phone: string;
}

export interface ResumeRecord {
  id: string;
  name: string;
  position: string;
  experienceYears: number;
  skills: string[];
  education: string;
  languages: string[];
  contactInfo: ContactInfo;
  createdAt: string;
  updatedAt: string;
}

export interface ResumeWriteModel {
  name: string;
  position: string;
  experienceYears: number;
  skills: string[];
  education: string;
  languages: string[];
  contactInfo: ContactInfo;
}

export type ResumeUpdateModel = Partial<ResumeWriteModel>;

export interface ResumeFilter {
  name?: string;
  position?: string;
}
