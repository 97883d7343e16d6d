import { forwardRef, KeyboardEvent, useImperativeHandle, useRef } from 'react';

interface AnswerInputProps {
  value: string;
  onChange: (value: string) => void;
  onEnterPress: () => void;
  isEnabled: boolean;
}

interface AnswerInputHandle {
  focus: () => void;
}

const AnswerInput = forwardRef<AnswerInputHandle, AnswerInputProps>(function AnswerInput({
  value,
  onChange,
  onEnterPress,
  isEnabled,
}, ref) {
  const inputRef = useRef<HTMLInputElement>(null);

  useImperativeHandle(ref, () => ({
    focus: () => inputRef.current?.focus(),
  }));

  const handleKeyDown = (e: KeyboardEvent<HTMLInputElement>): void => {
    if (e.key === 'Enter' && value.length > 0) {
      onEnterPress();
    }
  };

  return (
    <input
      ref={inputRef}
      type="text"
      value={value}
      onChange={(e) => onChange(e.target.value.toUpperCase().replace(/[^A-Z]/g, ''))}
      onKeyDown={handleKeyDown}
      disabled={!isEnabled}
      placeholder="Type a word"
      aria-label="Guess"
      style={{
        padding: '8px 12px',
        border: '2px solid #ddd',
        borderRadius: '4px',
        fontSize: '16px',
        minWidth: '150px',
        width: '100%',
        boxSizing: 'border-box',
        backgroundColor: isEnabled ? '#fff' : '#f5f5f5',
      }}
    />
  );
});

export default AnswerInput;
export type { AnswerInputHandle };
