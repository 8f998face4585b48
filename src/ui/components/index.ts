export { Header } from './Header.js';
export { QueryInput } from './QueryInput.js';
export { DepthSelect } from './DepthSelect.js';
export { ResearchProgress } from './ResearchProgress.js';
export { ResearchRun, type Researcher, type ResearchOutcome } from './ResearchRun.js';
export { ResultView } from './ResultView.js';
