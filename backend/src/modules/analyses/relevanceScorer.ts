import { roundTo } from '../../shared/utils/rounding.js';
import type { RelevanceAssessment } from './analyses.types.js';

export interface ScoringCandidate {
  name: string;
  experienceYears: number;
  skills: string[];
}

export interface ScoringJob {
  skillsRequired: string[];
  experienceRequired: number;
}

const MOCK_WEAKNESSES = ['Soft skills require an additional assessment', 'Education fit needs to be verified'];

const MOCK_RECOMMENDATIONS = ['Conduct a technical interview', "Assess the candidate's motivation"];

/**
 * Deterministic relevance heuristic: half of the score comes from the share of required
 * skills the candidate lists, the other half from experience relative to the requirement
 * (capped at 1). Both denominators are floored at 1, so an empty skill list contributes 0
 * and a zero-year requirement behaves like a one-year one.
 */
export const scoreRelevance = (candidate: ScoringCandidate, job: ScoringJob): RelevanceAssessment => {
  const required = new Set(job.skillsRequired);
  const skillOverlap = new Set(candidate.skills.filter((skill) => required.has(skill))).size;
  const totalRequired = job.skillsRequired.length;
  const skillMatchPct = (skillOverlap / Math.max(totalRequired, 1)) * 100;

  const experienceRatio = Math.min(candidate.experienceYears / Math.max(job.experienceRequired, 1), 1);

  const overallScore = (skillMatchPct + experienceRatio * 100) / 200;

  return {
    relevanceScore: roundTo(overallScore, 2),
    jobMatchPercentage: roundTo(overallScore * 100, 1),
    strengths: [
      `Skill match: ${skillOverlap}/${totalRequired}`,
      `Work experience: ${candidate.experienceYears} years`
    ],
    weaknesses: [...MOCK_WEAKNESSES],
    recommendations: [...MOCK_RECOMMENDATIONS],
    analysisText:
      `Candidate ${candidate.name} has ${skillOverlap} of ${totalRequired} required skills ` +
      `and ${candidate.experienceYears} years of work experience.`
  };
};
