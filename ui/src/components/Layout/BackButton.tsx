import React from 'react';
import { useAppDispatch } from '../../store/configureStore';
import { back } from '../../store/Navigation/slice';

const BackButton: React.FC = () => {
  const dispatch = useAppDispatch();
  return (
    <button
      type="button"
      onClick={() => dispatch(back())}
      className="text-sm text-slate-300 hover:text-white"
    >
      ← Back to Main
    </button>
  );
};

export default BackButton;
