import { useEffect, useMemo, useRef, useState } from 'react';
import { useNavigate, useParams } from 'react-router-dom';
import AnswerInput, { type AnswerInputHandle } from './components/AnswerInput';
import Board from './components/Board';
import WordList from './components/WordList';
import { DEFAULT_TILE_SET, DICTIONARY_URL } from './config';
import { decodeBoard, encodeBoard, formatBoard } from './utils/board';
import { generateBoard } from './utils/boardGeneration';
import { dictionaries } from './utils/dictionary';
import type { Board as BoardType, FoundWord } from './utils/models';
import { scoreWord } from './utils/scoring';
import { BoggleSolver } from './utils/solver';
import type { Trie } from './utils/trie';

const buttonStyle = {
  backgroundColor: '#4CAF50',
  color: 'white',
  border: 'none',
  borderRadius: '8px',
  padding: '8px 12px',
  fontSize: '14px',
  cursor: 'pointer',
  boxShadow: '0 2px 4px rgba(0,0,0,0.1)'
};

function logBoard(board: BoardType) {
  console.info(`Board ${encodeBoard(board)}\n${formatBoard(board)}`);
}

function App() {
  const { code } = useParams<{ code: string }>();
  const navigate = useNavigate();
  const inputRef = useRef<AnswerInputHandle>(null);
  const [board, setBoard] = useState<BoardType | null>(null);
  const [boardError, setBoardError] = useState<string | null>(null);
  const [trie, setTrie] = useState<Trie | null>(null);
  const [dictionaryError, setDictionaryError] = useState<string | null>(null);
  const [guess, setGuess] = useState('');
  const [foundWords, setFoundWords] = useState<FoundWord[]>([]);
  const [message, setMessage] = useState('');
  const [allWords, setAllWords] = useState<string[] | null>(null);

  // Load the dictionary once; the registry shares the trie across boards
  useEffect(() => {
    let cancelled = false;
    dictionaries.load(DICTIONARY_URL)
      .then(loaded => {
        if (!cancelled) setTrie(loaded);
      })
      .catch(error => {
        console.error('Failed to load dictionary:', error);
        if (!cancelled) setDictionaryError('Failed to load dictionary');
      });
    return () => {
      cancelled = true;
    };
  }, []);

  useEffect(() => {
    setFoundWords([]);
    setAllWords(null);
    setMessage('');
    setGuess('');

    if (!code) {
      const generated = generateBoard(DEFAULT_TILE_SET);
      logBoard(generated);
      setBoardError(null);
      setBoard(generated);
      return;
    }

    try {
      const decoded = decodeBoard(code);
      logBoard(decoded);
      setBoard(decoded);
      setBoardError(null);
    } catch (error) {
      console.warn(`Rejected board code "${code}":`, error);
      setBoard(null);
      setBoardError(error instanceof Error ? error.message : String(error));
    }
  }, [code]);

  const solver = useMemo(
    () => (board && trie ? new BoggleSolver(board, trie) : null),
    [board, trie]
  );

  const handleSubmit = () => {
    if (!solver) return;
    const word = guess;
    setGuess('');

    const accepted = solver.findWord(word);
    if (accepted === null) {
      setMessage(`${word} is not a valid word`);
    } else if (foundWords.some(found => found.word === accepted.word)) {
      setMessage(`You have already guessed ${accepted.word}`);
    } else {
      setFoundWords([...foundWords, accepted]);
      setMessage(`${accepted.word} was worth ${accepted.points} points`);
    }
    inputRef.current?.focus();
  };

  const handleReveal = () => {
    if (!solver) return;
    setAllWords([...solver.solve()].sort());
  };

  const handleNewBoard = () => {
    navigate(`/board/${encodeBoard(generateBoard(DEFAULT_TILE_SET))}`);
  };

  const lastFound = foundWords.length > 0 ? foundWords[foundWords.length - 1] : null;
  const totalPoints = foundWords.reduce((sum, found) => sum + found.points, 0);

  return (
    <div style={{ maxWidth: '420px', margin: '0 auto', padding: '16px', fontFamily: 'sans-serif' }}>
      <h1 style={{ textAlign: 'center', fontSize: '24px' }}>Word Grid</h1>

      {boardError && (
        <div role="alert" style={{ color: '#c62828', textAlign: 'center', marginBottom: '8px' }}>
          {boardError}
        </div>
      )}
      {dictionaryError && (
        <div role="alert" style={{ color: '#c62828', textAlign: 'center', marginBottom: '8px' }}>
          {dictionaryError}
        </div>
      )}

      <Board board={board} highlightedPath={lastFound ? lastFound.path : []} />

      <div style={{ display: 'flex', gap: '8px', marginTop: '16px' }}>
        <AnswerInput
          ref={inputRef}
          value={guess}
          onChange={setGuess}
          onEnterPress={handleSubmit}
          isEnabled={solver !== null}
        />
      </div>
      <p aria-live="polite" style={{ minHeight: '20px', color: '#333' }}>{message}</p>

      <WordList
        title="Your words"
        entries={foundWords.map(({ word, points }) => ({ word, points }))}
        totalPoints={totalPoints}
      />

      <div style={{ display: 'flex', gap: '8px', justifyContent: 'center', marginTop: '16px' }}>
        <button onClick={handleReveal} disabled={solver === null} style={buttonStyle}>
          Reveal all words
        </button>
        <button onClick={handleNewBoard} style={buttonStyle}>
          New board
        </button>
      </div>

      {allWords && solver && (
        <WordList
          title="All words"
          entries={allWords.map(word => ({ word, points: scoreWord(word) ?? 0 }))}
          totalPoints={solver.score(allWords)}
        />
      )}
    </div>
  );
}

export default App;
