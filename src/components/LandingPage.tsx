import { useState, type FormEvent } from 'react';
import { useNavigate } from 'react-router-dom';

const EXAMPLES = [
  'https://github.com/owner/repo/pull/12',
  'https://github.com/owner/repo/commit/1a2b3c4',
  'owner/repo#12@1a2b3c4',
];

// The server parses whatever is entered here
export function LandingPage() {
  const navigate = useNavigate();
  const [reference, setReference] = useState('');

  const handleSubmit = (e: FormEvent) => {
    e.preventDefault();
    const trimmed = reference.trim();
    if (!trimmed) return;
    navigate(`/review?ref=${encodeURIComponent(trimmed)}`);
  };

  return (
    <div className="landing-page">
      <h1 className="landing-title">diffdeck</h1>
      <p className="landing-subtitle">Review every change between two revisions without cloning.</p>
      <form className="landing-form" onSubmit={handleSubmit}>
        <input
          className="landing-input"
          value={reference}
          onChange={(e) => setReference(e.target.value)}
          placeholder="Pull request or commit URL"
          autoFocus
        />
        <button className="landing-submit" type="submit" disabled={!reference.trim()}>
          Review
        </button>
      </form>
      <ul className="landing-examples">
        {EXAMPLES.map((example) => (
          <li key={example}>
            <button type="button" onClick={() => setReference(example)}>{example}</button>
          </li>
        ))}
      </ul>
    </div>
  );
}
