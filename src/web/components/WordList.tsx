interface WordListEntry {
  word: string;
  points: number;
}

interface WordListProps {
  title: string;
  entries: WordListEntry[];
  totalPoints: number;
}

function WordList({ title, entries, totalPoints }: WordListProps) {
  return (
    <section aria-label={title} style={{ marginTop: '16px' }}>
      <h2 style={{ fontSize: '16px', margin: '0 0 8px' }}>
        {title}
      </h2>
      <p style={{ margin: '0 0 8px', color: '#666' }}>
        {`${entries.length} words · ${totalPoints} points`}
      </p>
      <ul style={{ listStyle: 'none', padding: 0, margin: 0, columns: 2 }}>
        {entries.map(({ word, points }) => (
          <li key={word} style={{ display: 'flex', justifyContent: 'space-between', gap: '8px' }}>
            <span>{word}</span>
            <span style={{ fontWeight: 'bold', color: '#4caf50' }}>{points}</span>
          </li>
        ))}
      </ul>
    </section>
  );
}

export default WordList;
export type { WordListEntry };
