import { TypingTest } from '@/components/features/typing/TypingTest';
import { loadAppConfig } from '@/config/app.config';
import { FileSentenceRepository } from '@/lib/db/repositories';

import { Providers } from './providers';

// The sentence file is read per request so edits show up without a rebuild.
export const dynamic = 'force-dynamic';

export default async function HomePage(): Promise<JSX.Element> {
  const config = loadAppConfig();
  const corpus = await new FileSentenceRepository(config.sentencesPath).load();

  return (
    <Providers corpus={corpus}>
      <TypingTest />
    </Providers>
  );
}
