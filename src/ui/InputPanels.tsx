import { COLOR_CHANNELS, toHex } from '../model/colorMatch';
import type { ColorControl } from '../model/colorMatch';
import type { IsotopeControl } from '../model/isotope';
import type { MemoryControl } from '../model/memory';
import type { ColorChannel } from '../model/types';
import { useStoreVersion } from './hooks';

const CHANNEL_LABELS: Record<ColorChannel, string> = {
  r: 'Red',
  g: 'Green',
  b: 'Blue'
};

export function ColorPanel({ control }: { control: ColorControl }): JSX.Element {
  useStoreVersion(control);
  const { target, current } = control.getState();

  return (
    <div className="color-panel">
      <div className="color-swatches">
        <span>Chase This Color:</span>
        <div className="swatch" data-testid="target-swatch" style={{ backgroundColor: toHex(target) }} />
        <span>Your Color:</span>
        <div className="swatch" data-testid="current-swatch" style={{ backgroundColor: toHex(current) }} />
      </div>
      {COLOR_CHANNELS.map((channel) => (
        <label key={channel} className="channel-row" htmlFor={`channel-${channel}`}>
          {CHANNEL_LABELS[channel]}
          <input
            id={`channel-${channel}`}
            data-testid={`channel-${channel}`}
            type="range"
            min={0}
            max={255}
            value={current[channel]}
            onChange={(event) => {
              control.setChannel(channel, Number(event.target.value));
            }}
          />
        </label>
      ))}
    </div>
  );
}

export function IsotopePanel({ control }: { control: IsotopeControl }): JSX.Element {
  useStoreVersion(control);
  const { displayed } = control.getState();

  return (
    <div className="isotope-panel">
      <input
        data-testid="isotope-slider"
        aria-label="Isotope level"
        type="range"
        min={0}
        max={100}
        value={displayed}
        onChange={(event) => {
          control.setValue(Number(event.target.value));
        }}
      />
    </div>
  );
}

export function MemoryPanel({ control }: { control: MemoryControl }): JSX.Element {
  useStoreVersion(control);
  const board = control.getState();

  return (
    <div className="memory-panel">
      <div className="memory-grid">
        {board.cards.map((card, index) => (
          <button
            key={index}
            type="button"
            data-testid={`memory-card-${index}`}
            className={card.faceUp ? 'memory-card face-up' : 'memory-card'}
            disabled={card.matched}
            onClick={() => {
              control.select(index);
            }}
          >
            {card.faceUp ? card.symbol : '?'}
          </button>
        ))}
      </div>
      <p>
        Pairs: <strong data-testid="memory-pairs">{board.matchedPairs}</strong>
      </p>
      <button type="button" data-testid="memory-new-game" onClick={() => control.newGame()}>
        New game
      </button>
    </div>
  );
}
