import React, { useRef } from 'react';
import { FileAudio } from 'lucide-react';
import { SUPPORTED_AUDIO_EXTENSIONS } from '../constants';

interface FileUploaderProps {
  onFileSelected: (file: File) => void;
  onRejected: (fileName: string) => void;
  disabled: boolean;
}

export const isSupportedAudio = (fileName: string): boolean =>
  SUPPORTED_AUDIO_EXTENSIONS.some(ext => fileName.toLowerCase().endsWith(ext));

export const FileUploader: React.FC<FileUploaderProps> = ({ onFileSelected, onRejected, disabled }) => {
  const inputRef = useRef<HTMLInputElement>(null);

  const handleChange = (e: React.ChangeEvent<HTMLInputElement>) => {
    const file = e.target.files?.[0];
    // Reset so picking the same file twice still fires onChange.
    e.target.value = '';
    if (!file) return;

    if (isSupportedAudio(file.name)) {
      onFileSelected(file);
    } else {
      onRejected(file.name);
    }
  };

  return (
    <div className="flex flex-col gap-2">
      <input
        type="file"
        ref={inputRef}
        onChange={handleChange}
        accept={SUPPORTED_AUDIO_EXTENSIONS.join(',')}
        className="hidden"
      />
      <button
        onClick={() => inputRef.current?.click()}
        disabled={disabled}
        className={`flex items-center justify-center gap-2 px-6 py-5 border-2 border-dashed rounded-lg transition-colors ${
          disabled
            ? 'border-gray-700 bg-gray-800 text-gray-600 cursor-not-allowed'
            : 'border-blue-500 bg-blue-500/10 text-blue-400 hover:bg-blue-500/20 cursor-pointer hover:border-blue-400'
        }`}
      >
        <FileAudio className="w-7 h-7" />
        <div className="text-left">
          <div className="font-semibold">Upload audio file</div>
          <div className="text-xs opacity-70">WAV, MP3, M4A, OGG, WEBM</div>
        </div>
      </button>
    </div>
  );
};
