import type { JobRecord } from '../jobs/jobs.types.js';
import type { ResumeRecord } from '../resumes/resumes.types.js';

export const ANALYSIS_SYSTEM_PROMPT =
  'You are an expert in résumé screening and recruiting. Reply with a single JSON object and nothing else.';

const joinList = (values: string[]) => (values.length ? values.join(', ') : 'not specified');

export const buildAnalysisPrompt = (resume: ResumeRecord, job: JobRecord) =>
  [
    'Assess how relevant the candidate résumé is for the job posting below.',
    '',
    'RÉSUMÉ:',
    `Name: ${resume.name}`,
    `Position: ${resume.position}`,
    `Work experience: ${resume.experienceYears} years`,
    `Skills: ${joinList(resume.skills)}`,
    `Education: ${resume.education || 'not specified'}`,
    `Languages: ${joinList(resume.languages)}`,
    '',
    'JOB POSTING:',
    `Title: ${job.title}`,
    `Requirements: ${joinList(job.requirements)}`,
    `Responsibilities: ${joinList(job.responsibilities)}`,
    `Required skills: ${joinList(job.skillsRequired)}`,
    `Required experience: ${job.experienceRequired} years`,
    '',
    'Answer in this JSON format:',
    '{',
    '  "relevance_score": 0.85,',
    '  "strengths": ["strength 1", "strength 2"],',
    '  "weaknesses": ["weakness 1", "weakness 2"],',
    '  "recommendations": ["recommendation 1", "recommendation 2"],',
    '  "job_match_percentage": 85,',
    '  "analysis_text": "A detailed relevance analysis..."',
    '}'
  ].join('\n');
